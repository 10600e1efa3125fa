import { describe, it, expect, vi, beforeEach } from 'vitest';
import { join, resolve } from 'path';
import type { CommandHost } from '../../src/lib/host/types.js';
import type { BundleResult } from '../../src/lib/bundler.js';

const mocks = vi.hoisted(() => ({
  host: { current: undefined as CommandHost | undefined },
  bundleModule: vi.fn(),
  logger: {
    success: vi.fn(),
    debug: vi.fn(),
    step: vi.fn(),
    file: vi.fn(),
    blank: vi.fn(),
    dim: vi.fn(),
  },
}));

vi.mock('../../src/lib/bundler.js', () => ({
  bundleModule: mocks.bundleModule,
}));

vi.mock('../../src/lib/config.js', async () => {
  const { defaultConfig } = await import('../../src/schemas/config.schema.js');
  return {
    loadConfig: vi.fn(async () => ({
      config: {
        ...defaultConfig,
        bundle: { ...defaultConfig.bundle, sourceDir: '/project/scripts', outDir: '/project', exclude: '*.Tests.ps1' },
      },
      filepath: '/project/.cmdocrc.json',
    })),
  };
});

vi.mock('../../src/lib/host/index.js', () => ({
  createHost: () => mocks.host.current,
}));

vi.mock('../../src/ui/index.js', () => ({
  logger: mocks.logger,
  withSpinner: async <T>(_text: string, fn: () => Promise<T>): Promise<T> => fn(),
  formatCount: (count: number, label: string) => `${count} ${label}${count === 1 ? '' : 's'}`,
  formatPath: (path: string) => path,
}));

import { FakeHost } from '../utils/fakeHost.js';

const result: BundleResult = {
  outputPath: '/project/Widgets.psm1',
  files: ['/project/scripts/Get-Widget.ps1', '/project/scripts/Set-Widget.ps1'],
  content: Buffer.from('function Get-Widget {}\nfunction Set-Widget {}'),
  hashes: {
    '/project/scripts/Get-Widget.ps1': 'aa',
    '/project/scripts/Set-Widget.ps1': 'bb',
  },
};

describe('bundle command', () => {
  let host: FakeHost;

  beforeEach(() => {
    vi.resetModules();
    vi.clearAllMocks();
    host = new FakeHost();
    mocks.host.current = host;
    mocks.bundleModule.mockResolvedValue(result);
  });

  it('bundles with the configured folders and reloads the module', async () => {
    const { bundleCommand } = await import('../../src/commands/bundle.js');

    await bundleCommand.parseAsync(['Widgets'], { from: 'user' });

    expect(mocks.bundleModule).toHaveBeenCalledWith({
      moduleName: 'Widgets',
      sourceDir: '/project/scripts',
      outDir: '/project',
      exclude: '*.Tests.ps1',
      scriptExtension: 'ps1',
      bundleExtension: 'psm1',
    });
    expect(host.reloads).toEqual([{ moduleName: 'Widgets', modulePath: '/project/Widgets.psm1' }]);
    expect(mocks.logger.debug).toHaveBeenCalledWith('aa  /project/scripts/Get-Widget.ps1');
  });

  it('lets flags override the config', async () => {
    const { bundleCommand } = await import('../../src/commands/bundle.js');

    await bundleCommand.parseAsync(['Widgets', '-s', 'src', '-o', '/tmp/out', '-x', 'Private-*'], { from: 'user' });

    expect(mocks.bundleModule).toHaveBeenCalledWith(
      expect.objectContaining({
        sourceDir: resolve('src'),
        outDir: join('/tmp', 'out'),
        exclude: 'Private-*',
      })
    );
  });

  it('skips the reload with --no-reload', async () => {
    const { bundleCommand } = await import('../../src/commands/bundle.js');

    await bundleCommand.parseAsync(['Widgets', '--no-reload'], { from: 'user' });

    expect(host.reloads).toEqual([]);
    expect(mocks.logger.dim).toHaveBeenCalledWith('Skipped reloading the module');
  });

  it('does not reload when bundling fails', async () => {
    const { NotFoundError } = await import('../../src/errors.js');
    mocks.bundleModule.mockRejectedValue(new NotFoundError('directory', '/project/scripts'));
    const { bundleCommand } = await import('../../src/commands/bundle.js');

    await expect(bundleCommand.parseAsync(['Widgets'], { from: 'user' })).rejects.toThrow(
      'Directory not found: /project/scripts'
    );
    expect(host.reloads).toEqual([]);
  });
});
