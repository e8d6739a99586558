import { describe, it, expect } from 'vitest';
import pkg from '../../package.json' with { type: 'json' };
import { USER_AGENT, VERSION } from '../version.js';

describe('version', () => {
  it('reads the version from the package manifest', () => {
    expect(VERSION).toBe(pkg.version);
    expect(USER_AGENT).toBe(`skillpin-cli/${pkg.version}`);
  });
});
