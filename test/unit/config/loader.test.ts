import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import { DEFAULT_CONFIG, loadConfig } from '../../../src/config/loader.js';

describe('loadConfig', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'postinstall-cfg-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('uses defaults quietly when postinstall.yaml is absent', () => {
    const result = loadConfig(undefined, tmpDir);
    expect(result).toEqual({
      config: DEFAULT_CONFIG,
      configPath: path.join(tmpDir, 'postinstall.yaml'),
      source: 'defaults',
      issues: [],
    });
  });

  it('reports an explicitly named file that does not exist', () => {
    const result = loadConfig('custom.yaml', tmpDir);
    expect(result.source).toBe('defaults');
    expect(result.issues).toEqual([`Config file ${path.join(tmpDir, 'custom.yaml')} not found, using defaults`]);
  });

  it('merges overrides over defaults, including nested ssh_key keys', async () => {
    await fs.writeFile(path.join(tmpDir, 'postinstall.yaml'), [
      'packages_file: /srv/provision/packages.txt',
      'rc_append_mode: managed',
      'ssh_key:',
      '  prompt: false',
      'distro:',
      '  family: rhel',
    ].join('\n'));

    const { config, source, issues } = loadConfig(undefined, tmpDir);

    expect(source).toBe('file');
    expect(issues).toEqual([]);
    expect(config).toEqual({
      ...DEFAULT_CONFIG,
      packages_file: '/srv/provision/packages.txt',
      rc_append_mode: 'managed',
      ssh_key: { prompt: false, public_key: null },
      distro: { family: 'rhel' },
    });
  });

  it('treats an empty file as no overrides', async () => {
    await fs.writeFile(path.join(tmpDir, 'postinstall.yaml'), '');
    const { config, source } = loadConfig(undefined, tmpDir);
    expect(source).toBe('file');
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('falls back to defaults on schema violations', async () => {
    await fs.writeFile(path.join(tmpDir, 'postinstall.yaml'), 'rc_append_mode: sometimes\n');
    const { config, source, issues } = loadConfig(undefined, tmpDir);

    expect(source).toBe('defaults');
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(issues).toHaveLength(1);
    expect(issues[0]).toContain('rc_append_mode');
  });

  it('rejects an empty or blank public_key instead of registering a blank line', async () => {
    await fs.writeFile(path.join(tmpDir, 'postinstall.yaml'), 'ssh_key:\n  public_key: "  "\n');
    const { config, source, issues } = loadConfig(undefined, tmpDir);

    expect(source).toBe('defaults');
    expect(config.ssh_key.public_key).toBeNull();
    expect(issues).toHaveLength(1);
    expect(issues[0]).toContain(': ssh_key.public_key: ');
  });

  it('rejects unknown keys', async () => {
    await fs.writeFile(path.join(tmpDir, 'postinstall.yaml'), 'log_directory: /var/log\n');
    expect(loadConfig(undefined, tmpDir).issues).toHaveLength(1);
  });

  it('falls back to defaults on YAML syntax errors', async () => {
    await fs.writeFile(path.join(tmpDir, 'postinstall.yaml'), 'ssh_key: [unclosed\n');
    const { source, issues } = loadConfig(undefined, tmpDir);
    expect(source).toBe('defaults');
    expect(issues[0]).toMatch(/^Failed to parse /);
  });

  it('does not share the default ssh_key object between results', () => {
    const a = loadConfig(undefined, tmpDir).config;
    a.ssh_key.prompt = false;
    expect(loadConfig(undefined, tmpDir).config.ssh_key.prompt).toBe(true);
  });
});
