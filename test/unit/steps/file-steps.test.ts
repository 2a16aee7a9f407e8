import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import { motdStep } from '../../../src/steps/motd.js';
import { bashrcStep, nanorcStep } from '../../../src/steps/rc-overlays.js';
import { packagesStep } from '../../../src/steps/packages.js';
import { FakeHost, makeContext } from '../../helpers/fakes.js';

describe('overlay steps', () => {
  let tmpDir: string;
  let configDir: string;
  let home: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'postinstall-steps-'));
    configDir = path.join(tmpDir, 'config');
    home = path.join(tmpDir, 'home');
    await fs.mkdir(configDir);
    await fs.mkdir(home);
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  describe('motdStep', () => {
    it('overwrites the motd with motd.txt', async () => {
      const motd = path.join(tmpDir, 'motd');
      await fs.writeFile(motd, 'old banner\n');
      await fs.writeFile(path.join(configDir, 'motd.txt'), 'Welcome.\n');
      const { ctx, messages } = makeContext({ home, config: { config_dir: configDir, motd_path: motd } });

      await expect(motdStep.run(ctx)).resolves.toMatchObject({ status: 'done' });
      expect(await fs.readFile(motd, 'utf-8')).toBe('Welcome.\n');
      expect(messages()).toEqual(['MOTD updated.']);
    });

    it('skips when motd.txt is missing', async () => {
      const motd = path.join(tmpDir, 'motd');
      const { ctx, messages } = makeContext({ home, config: { config_dir: configDir, motd_path: motd } });

      await expect(motdStep.run(ctx)).resolves.toEqual({ status: 'skipped', detail: 'motd.txt not found' });
      expect(messages()).toEqual(['motd.txt not found.']);
      await expect(fs.access(motd)).rejects.toMatchObject({ code: 'ENOENT' });
    });
  });

  describe('bashrcStep', () => {
    it('appends to an existing .bashrc and leaves it owned by the target user', async () => {
      await fs.writeFile(path.join(home, '.bashrc'), '# default\n');
      await fs.writeFile(path.join(configDir, 'bashrc.append'), "alias ll='ls -alF'\n");
      const { ctx, messages } = makeContext({ home, config: { config_dir: configDir } });

      await expect(bashrcStep.run(ctx)).resolves.toMatchObject({ status: 'done' });
      expect(await fs.readFile(path.join(home, '.bashrc'), 'utf-8')).toBe("# default\nalias ll='ls -alF'\n");
      expect((await fs.stat(path.join(home, '.bashrc'))).uid).toBe(ctx.user.uid);
      expect(messages()).toEqual(['.bashrc customized.']);
    });

    it('duplicates the fragment when run twice in append mode', async () => {
      await fs.writeFile(path.join(configDir, 'bashrc.append'), 'export EDITOR=nano\n');
      const { ctx } = makeContext({ home, config: { config_dir: configDir } });

      await bashrcStep.run(ctx);
      await bashrcStep.run(ctx);

      expect(await fs.readFile(path.join(home, '.bashrc'), 'utf-8')).toBe('export EDITOR=nano\nexport EDITOR=nano\n');
    });

    it('keeps one copy when run twice in managed mode', async () => {
      await fs.writeFile(path.join(configDir, 'bashrc.append'), 'export EDITOR=nano\n');
      const { ctx } = makeContext({ home, config: { config_dir: configDir, rc_append_mode: 'managed' } });

      await bashrcStep.run(ctx);
      await bashrcStep.run(ctx);

      const content = await fs.readFile(path.join(home, '.bashrc'), 'utf-8');
      expect(content.split('export EDITOR=nano')).toHaveLength(2);
    });

    it('skips when bashrc.append is missing', async () => {
      const { ctx, messages } = makeContext({ home, config: { config_dir: configDir } });

      await expect(bashrcStep.run(ctx)).resolves.toEqual({ status: 'skipped', detail: 'bashrc.append not found' });
      expect(messages()).toEqual(['bashrc.append not found.']);
    });
  });

  describe('nanorcStep', () => {
    it('creates .nanorc when absent', async () => {
      await fs.writeFile(path.join(configDir, 'nanorc.append'), 'set linenumbers\n');
      const { ctx, messages } = makeContext({ home, config: { config_dir: configDir } });

      await expect(nanorcStep.run(ctx)).resolves.toMatchObject({ status: 'done' });
      expect(await fs.readFile(path.join(home, '.nanorc'), 'utf-8')).toBe('set linenumbers\n');
      expect(messages()).toEqual(['.nanorc customized.']);
    });

    it('does not depend on the bashrc overlay being present', async () => {
      await fs.writeFile(path.join(configDir, 'nanorc.append'), 'set tabsize 4\n');
      const { ctx } = makeContext({ home, config: { config_dir: configDir } });

      await expect(bashrcStep.run(ctx)).resolves.toMatchObject({ status: 'skipped' });
      await expect(nanorcStep.run(ctx)).resolves.toMatchObject({ status: 'done' });
    });
  });

  describe('packagesStep', () => {
    it('skips without touching the package manager when the list is missing', async () => {
      const { ctx, host } = makeContext({ home, config: { packages_file: path.join(tmpDir, 'none.txt') } });

      await expect(packagesStep.run(ctx)).resolves.toEqual({ status: 'skipped', detail: 'package list not found' });
      expect(host.calls).toEqual([]);
    });

    it('summarises processed and failed packages', async () => {
      const list = path.join(tmpDir, 'packages.txt');
      await fs.writeFile(list, 'curl\nbroken\ngit\n');
      const host = new FakeHost(['git']);
      host.broken.add('broken');
      const { ctx } = makeContext({ home, host, config: { packages_file: list } });

      await expect(packagesStep.run(ctx)).resolves.toEqual({ status: 'done', detail: '3 package(s) processed, 1 failed' });
    });
  });
});
