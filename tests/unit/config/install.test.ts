import { describe, it, expect } from '@jest/globals';
import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

const root = path.join(__dirname, '..', '..', '..');

const Manifest = z.object({
  dependencies: z.record(z.string()),
  overrides: z.record(z.string()).optional(),
  scripts: z.record(z.string()),
});

describe('Install setup', () => {
  const manifest = Manifest.parse(JSON.parse(fs.readFileSync(path.join(root, 'package.json'), 'utf-8')));

  it('pins the ONNX runtime to one exact release', () => {
    expect(manifest.dependencies['@huggingface/transformers']).toBeDefined();
    expect(manifest.overrides?.['onnxruntime-node']).toMatch(/^\d+\.\d+\.\d+$/);
  });

  it('skips the runtime download step', () => {
    const npmrc = fs.readFileSync(path.join(root, '.npmrc'), 'utf-8');
    expect(npmrc).toContain('onnxruntime-node-install-cuda=skip\n');
    expect(npmrc).toContain('onnxruntime-node-install=skip\n');
  });

  it('has no install hooks of its own', () => {
    expect(manifest.scripts.postinstall).toBeUndefined();
    expect(manifest.scripts.prepare).toBeUndefined();
    expect(manifest.scripts.preinstall).toBeUndefined();
  });
});
