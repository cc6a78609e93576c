import { afterEach, describe, expect, it, vi } from 'vitest';
import { handleVersionCommand } from './version.js';

describe('handleVersionCommand', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints the package version', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    expect(handleVersionCommand()).toEqual({ exitCode: 0 });
    expect(logSpy).toHaveBeenCalledWith('cfgtree v0.1.0');
  });
});
