import { describe, it, expect } from 'vitest';
import { createCommandVerifier } from '../verify_hook.js';

describe('createCommandVerifier', () => {
  it('passes the patched copy to the command in place of {file}', async () => {
    const verify = createCommandVerifier('grep -q "i != 0" {file}');

    expect(await verify('/src/dbz.c', 'if (i != 0) total += 10 / i;\n')).toEqual({ ok: true });
  });

  it('appends the path when the command has no placeholder', async () => {
    const verify = createCommandVerifier('test -s');

    expect(await verify('/src/empty.c', '')).toEqual({ ok: false, detail: 'verify command exited with 1' });
  });

  it('reports the exit code and output of a failing command', async () => {
    const verify = createCommandVerifier('cat {file} && exit 3');

    expect(await verify('/src/dbz.c', 'int x\n')).toEqual({
      ok: false,
      detail: 'verify command exited with 3: int x',
    });
  });
});
