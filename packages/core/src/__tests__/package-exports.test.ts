import { existsSync, readFileSync } from 'fs';
import { posix } from 'path';
import { fileURLToPath } from 'url';
import { describe, expect, it } from 'vitest';

function readJson(relative: string): unknown {
  return JSON.parse(readFileSync(fileURLToPath(new URL(relative, import.meta.url)), 'utf8'));
}

function field(value: unknown, ...path: string[]): unknown {
  let current = value;
  for (const key of path) {
    if (typeof current !== 'object' || current === null) return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}

/** Where tsc puts the output for `source` under the given tsconfig options. */
function emitted(tsconfig: unknown, source: string): string {
  const rootDir = String(field(tsconfig, 'compilerOptions', 'rootDir'));
  const outDir = String(field(tsconfig, 'compilerOptions', 'outDir'));
  return posix.join(outDir, posix.relative(rootDir, source).replace(/\.ts$/, '.js'));
}

describe('@telemetry-relay/core package entry points', () => {
  const pkg = readJson('../../package.json');
  const buildConfig = readJson('../../tsconfig.build.json');

  it('resolves to built JavaScript at run time', () => {
    expect(field(pkg, 'exports', '.', 'default')).toBe(`./${emitted(buildConfig, 'src/index.ts')}`);
    expect(field(pkg, 'main')).toBe('./dist/index.js');
  });

  it('resolves to the TypeScript sources for types and development', () => {
    expect(field(pkg, 'exports', '.', 'types')).toBe('./src/index.ts');
    expect(field(pkg, 'exports', '.', 'development')).toBe('./src/index.ts');
    expect(existsSync(fileURLToPath(new URL('../index.ts', import.meta.url)))).toBe(true);
  });
});

describe('relay binary', () => {
  const rootPkg = readJson('../../../../package.json');
  const rootConfig = readJson('../../../../tsconfig.json');

  it('points at the compiled CLI entry', () => {
    expect(field(rootPkg, 'bin', 'relay')).toBe(emitted(rootConfig, 'apps/relay/src/index.ts'));
  });

  it('builds the core package before the relay', () => {
    const build = String(field(rootPkg, 'scripts', 'build'));
    const core = build.indexOf('npm run build --workspace @telemetry-relay/core');
    const relay = build.indexOf('tsc -p tsconfig.build.json');

    expect(core).toBe(0);
    expect(relay).toBeGreaterThan(core);
  });
});
