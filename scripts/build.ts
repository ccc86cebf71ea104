/*
 * Script to bundle the library (ESM, CJS and browser IIFE) and emit its declarations.
 *
 * Hint: Don't use top level await here since this will cause the debugger to
 * hang on exit.
 */

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { execSync, spawn } from 'node:child_process';
import { build, type BuildOptions } from 'esbuild';
import { glob } from 'glob';

/**
 * Defines if the the build should be a production build.
 */
const prod = process.env.NODE_ENV === 'production';

/**
 * Base dir of the project.
 */
const baseDir = path.join(path.dirname(fileURLToPath(import.meta.url)), '..');

/**
 * Version from the package.json, used when git has no tag to describe.
 */
function readPackageVersion (): string {
  const pkg: unknown = JSON.parse(fs.readFileSync(path.join(baseDir, 'package.json'), 'utf8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

/*
 * create version information
 */
const commitId = execSync('git log --format="%H" -n1 2>/dev/null || echo dev').toString().trim();
const version = execSync('git describe 2>/dev/null || true').toString().trim().replace(/^v/, '') || `${readPackageVersion()}-${commitId}`;
console.log(`
Version: ${version}
Commit-ID: ${commitId}
`);

let building = false;
let buildCounter = 0;

async function runCommand (command: string, args: string[], cwd: string): Promise<void> {
  return await new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd,
      stdio: 'inherit',
    });

    child.on('error', (err) => {
      reject(err);
    });

    child.on('exit', (code, signal) => {
      if (code === 0) {
        resolve();
        return;
      }

      reject(new Error(`Command failed: ${command} ${args.join(' ')} (code=${code ?? 'null'}, signal=${signal ?? 'null'})`));
    });
  });
}

/**
 * Common build options.
 */
const buildOptions: BuildOptions = {
  outbase: './src',
  platform: 'neutral',
  external: [],
  sourcemap: true,
  target: 'node20',
  treeShaking: true,
  metafile: true,
  banner: {
    js: `/* context-encoder ${version} */`,
  },
};

/**
 * Options of the browser bundle, exposing the API as `contextEncoder`.
 */
const browserOptions: BuildOptions = {
  ...buildOptions,
  entryPoints: [
    './src/index.ts',
  ],
  bundle: true,
  format: 'iife',
  platform: 'browser',
  target: 'es2020',
  globalName: 'contextEncoder',
  sourcemap: false,
};

/**
 * Do the build.
 */
async function doBuild (): Promise<boolean> {
  building = true;

  process.stdout.write(`Doing ${prod ? 'production' : 'development'} build #${++buildCounter} ... `);
  const startTime = Date.now();

  /** return success state */
  let success = true;

  const entryPoints = await glob('./src/**/*.ts');

  const [ esmResult, cjsResult, browserResult, browserMinResult ] = await Promise.all([
    // ESM build
    build({
      ...buildOptions,
      entryPoints,
      outdir: './dist/esm',
      format: 'esm',
    }),

    // CJS build
    build({
      ...buildOptions,
      entryPoints,
      outdir: './dist/cjs',
      format: 'cjs',
    }),

    // Browser build
    build({
      ...browserOptions,
      outfile: './dist/browser/context-encoder.js',
    }),

    // Browser build (minified)
    build({
      ...browserOptions,
      outfile: './dist/browser/context-encoder.min.js',
      minify: true,
    }),

    // .d.ts and tsc output
    runCommand('npm', [ 'exec', '--', 'tsc', '-p', 'tsconfig.build.json' ], baseDir)
      .catch((err: unknown) => {
        // report, but let the bundles finish
        console.error(err);
        success = false;
      }),
  ]);

  // write results metafiles
  await Promise.all([
    fs.promises.writeFile(path.join(baseDir, 'dist', 'metaEsm.json'), JSON.stringify(esmResult.metafile, undefined, 2)),
    fs.promises.writeFile(path.join(baseDir, 'dist', 'metaCjs.json'), JSON.stringify(cjsResult.metafile, undefined, 2)),
    fs.promises.writeFile(path.join(baseDir, 'dist', 'metaBrowser.json'), JSON.stringify(browserResult.metafile, undefined, 2)),
    fs.promises.writeFile(path.join(baseDir, 'dist', 'metaBrowserMin.json'), JSON.stringify(browserMinResult.metafile, undefined, 2)),
  ]);

  // Ensure Node treats dist/cjs/*.js as CommonJS even though the package root is type=module.
  await fs.promises.writeFile(
    path.join(baseDir, 'dist', 'cjs', 'package.json'),
    JSON.stringify({ type: 'commonjs' }, undefined, 2) + '\n',
  );

  const duration = Date.now() - startTime;
  process.stdout.write(`Build done in ${(duration / 1000).toFixed(2)}s\n`);

  building = false;

  return success;
}

/**
 * Main function to init the process
 */
async function main (): Promise<void> {

  // run a normal build
  const success = await doBuild();

  // Watch for changes?
  if (!process.argv.includes('--watch')) {
    // exit with proper code
    process.exit(success ? 0 : 1);
  }

  let debounce: NodeJS.Timeout | null = null;

  console.log('Watching for src changes ...');

  const watcher = fs.watch('src', { recursive: true }, (_event, _filename) => {
    if (debounce) {
      clearTimeout(debounce);
    }

    // run build debounced
    debounce = setTimeout(() => {
      debounce = null;

      // do nothing if already building
      if (building) return;

      doBuild().catch((err: unknown) => {
        building = false;
        console.error('Build failed', err);
      });
    }, 2000);
  });

  process.on('SIGINT', () => {
    console.log('Stop watching for changes');
    watcher.close();
  });
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
