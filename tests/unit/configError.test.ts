import { describe, it, expect } from 'vitest';
import fs from 'fs';
import path from 'path';
import { loadConfig } from '../../src/config/index.js';

describe('config error handling', () => {
  it('throws on invalid JSON', () => {
    const tmp = path.join(process.cwd(), 'bad-build-siren-config.json');
    fs.writeFileSync(tmp, '{ invalid');
    try {
      expect(() => loadConfig('bad-build-siren-config.json')).toThrow(/Failed to parse config file/);
    } finally {
      fs.unlinkSync(tmp);
    }
  });

  it('throws when the file is not a JSON object', () => {
    const tmp = path.join(process.cwd(), 'array-build-siren-config.json');
    fs.writeFileSync(tmp, '[1, 2]');
    try {
      expect(() => loadConfig('array-build-siren-config.json')).toThrow(/must contain a JSON object/);
    } finally {
      fs.unlinkSync(tmp);
    }
  });
});
