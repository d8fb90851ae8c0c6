import { existsSync, readFileSync } from 'fs';
import path from 'path';
import { describe, it, expect } from 'vitest';
import { projectRoot } from '../utils/index.js';

const readJson = (file: string): unknown => JSON.parse(readFileSync(path.join(projectRoot, file), 'utf8'));

const binPath = (pkg: unknown): string | null => {
  if (typeof pkg !== 'object' || pkg === null || !('bin' in pkg)) {
    return null;
  }
  const { bin } = pkg;
  if (typeof bin !== 'object' || bin === null || !('vsplit' in bin) || typeof bin.vsplit !== 'string') {
    return null;
  }
  return bin.vsplit;
};

describe('vsplit bin', () => {
  it('points at a launcher that loads the TypeScript entry through tsx', () => {
    const bin = binPath(readJson('package.json'));
    expect(bin).toBe('backend/bin/vsplit.js');

    const launcher = path.join(projectRoot, 'backend/bin/vsplit.js');
    const source = readFileSync(launcher, 'utf8');

    expect(source.startsWith('#!/usr/bin/env node\n')).toBe(true);
    expect(source).toContain("import { register } from 'tsx/esm/api';");
    expect(source).toContain("await import('../src/index.ts');");
    expect(existsSync(path.resolve(path.dirname(launcher), '../src/index.ts'))).toBe(true);
  });
});
