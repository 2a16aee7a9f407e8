import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import { chownRecursive, isErrno } from '../../../src/host/ownership.js';

describe('chownRecursive', () => {
  let tmpDir: string;
  const uid = process.getuid?.() ?? 0;
  const gid = process.getgid?.() ?? 0;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'postinstall-own-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('walks nested directories', async () => {
    await fs.mkdir(path.join(tmpDir, 'a', 'b'), { recursive: true });
    await fs.writeFile(path.join(tmpDir, 'a', 'b', 'f'), 'x');

    await chownRecursive(tmpDir, uid, gid);

    const stat = await fs.stat(path.join(tmpDir, 'a', 'b', 'f'));
    expect(stat.uid).toBe(uid);
    expect(stat.gid).toBe(gid);
  });

  it('accepts a plain file', async () => {
    const file = path.join(tmpDir, 'authorized_keys');
    await fs.writeFile(file, 'key\n');
    await expect(chownRecursive(file, uid, gid)).resolves.toBeUndefined();
  });

  it('propagates a missing path', async () => {
    await expect(chownRecursive(path.join(tmpDir, 'missing'), uid, gid)).rejects.toMatchObject({ code: 'ENOENT' });
  });
});

describe('isErrno', () => {
  it('matches on the error code', () => {
    const err = Object.assign(new Error('nope'), { code: 'ENOENT' });
    expect(isErrno(err, 'ENOENT')).toBe(true);
    expect(isErrno(err, 'EACCES')).toBe(false);
    expect(isErrno('ENOENT', 'ENOENT')).toBe(false);
  });
});
