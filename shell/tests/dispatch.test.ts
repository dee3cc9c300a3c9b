// shell/tests/dispatch.test.ts
//
// runCommand() against a stub provider: argument routing, stdout JSON and the
// exit code mapping main.ts applies.

import { describe, test, expect, vi } from 'vitest';
import { notFound, invalidArgument, type ProviderInstance } from '@ec2-runner/contracts';
import type { ExternalProvider } from '@ec2-runner/lifecycle';
import { EXIT_FAILURE, EXIT_NOT_FOUND, exitCodeFor, parseBootstrapInput, runCommand } from '../cli/src/dispatch';
import type { ProviderEnvironment } from '../cli/src/environment';

const INSTANCE: ProviderInstance = {
  provider_id: 'i-00000000000000001',
  name: 'runner-1',
  os_type: 'linux',
  os_arch: 'amd64',
  status: 'running',
};

const BOOTSTRAP = {
  name: 'runner-1',
  tools: [{ os: 'linux', architecture: 'x64', download_url: 'https://example.com/r.tar.gz', filename: 'r.tar.gz' }],
  repo_url: 'https://github.example.com/org/repo',
  'callback-url': 'https://garm.example.com/api/v1/callbacks',
  'metadata-url': 'https://garm.example.com/api/v1/metadata',
  'instance-token': 'test-token',
  os_type: 'linux',
  os_arch: 'amd64',
  flavor: 't3.small',
  image: 'ami-00000000000000001',
  pool_id: 'pool-A',
};

function stubProvider() {
  return {
    createInstance: vi.fn<ExternalProvider['createInstance']>(async () => INSTANCE),
    deleteInstance: vi.fn<ExternalProvider['deleteInstance']>(async () => {}),
    getInstance: vi.fn<ExternalProvider['getInstance']>(async () => INSTANCE),
    listInstances: vi.fn<ExternalProvider['listInstances']>(async () => []),
    removeAllInstances: vi.fn<ExternalProvider['removeAllInstances']>(async () => {}),
    stop: vi.fn<ExternalProvider['stop']>(async () => {}),
    start: vi.fn<ExternalProvider['start']>(async () => {}),
  } satisfies ExternalProvider;
}

function env(overrides: Partial<ProviderEnvironment>): ProviderEnvironment {
  return {
    command: 'CreateInstance',
    controllerId: 'ctrl-1',
    configFile: '/etc/garm/ec2.toml',
    debug: false,
    ...overrides,
  };
}

function io(stdin = '') {
  const out: string[] = [];
  return {
    out,
    readStdin: async () => stdin,
    writeStdout: (text: string) => {
      out.push(text);
    },
  };
}

describe('runCommand', () => {
  test('CreateInstance decodes stdin and prints the instance', async () => {
    const provider = stubProvider();
    const stdio = io(JSON.stringify(BOOTSTRAP));
    await runCommand(env({ command: 'CreateInstance' }), provider, stdio);

    expect(provider.createInstance).toHaveBeenCalledTimes(1);
    expect(provider.createInstance.mock.calls[0]?.[0].name).toBe('runner-1');
    expect(stdio.out).toEqual([`${JSON.stringify(INSTANCE)}\n`]);
  });

  test('GetInstance prints the instance', async () => {
    const provider = stubProvider();
    const stdio = io();
    await runCommand(env({ command: 'GetInstance', instanceId: 'runner-1' }), provider, stdio);
    expect(provider.getInstance).toHaveBeenCalledWith('runner-1', undefined);
    expect(stdio.out).toEqual([`${JSON.stringify(INSTANCE)}\n`]);
  });

  test('ListInstances prints an empty array for an empty pool', async () => {
    const provider = stubProvider();
    const stdio = io();
    await runCommand(env({ command: 'ListInstances', poolId: 'pool-A' }), provider, stdio);
    expect(provider.listInstances).toHaveBeenCalledWith('pool-A', undefined);
    expect(stdio.out).toEqual(['[]\n']);
  });

  test('DeleteInstance prints nothing', async () => {
    const provider = stubProvider();
    const stdio = io();
    await runCommand(env({ command: 'DeleteInstance', instanceId: 'runner-1' }), provider, stdio);
    expect(provider.deleteInstance).toHaveBeenCalledWith('runner-1', undefined);
    expect(stdio.out).toEqual([]);
  });

  test('StopInstance is never forced', async () => {
    const provider = stubProvider();
    await runCommand(env({ command: 'StopInstance', instanceId: 'runner-1' }), provider, io());
    expect(provider.stop).toHaveBeenCalledWith('runner-1', false, undefined);
  });

  test('StartInstance and RemoveAllInstances', async () => {
    const provider = stubProvider();
    await runCommand(env({ command: 'StartInstance', instanceId: 'runner-1' }), provider, io());
    await runCommand(env({ command: 'RemoveAllInstances', poolId: 'pool-A' }), provider, io());
    expect(provider.start).toHaveBeenCalledWith('runner-1', undefined);
    expect(provider.removeAllInstances).toHaveBeenCalledTimes(1);
  });

  test('passes the abort signal through', async () => {
    const provider = stubProvider();
    const controller = new AbortController();
    await runCommand(env({ command: 'GetInstance', instanceId: 'runner-1' }), provider, io(), controller.signal);
    expect(provider.getInstance).toHaveBeenCalledWith('runner-1', controller.signal);
  });

  test('provider errors propagate', async () => {
    const provider = stubProvider();
    provider.getInstance.mockRejectedValueOnce(notFound('instance', 'runner-1'));
    await expect(
      runCommand(env({ command: 'GetInstance', instanceId: 'runner-1' }), provider, io()),
    ).rejects.toMatchObject({ code: 'NOT_FOUND' });
  });
});

describe('parseBootstrapInput', () => {
  test('accepts a valid request with extra fields', () => {
    const parsed = parseBootstrapInput(JSON.stringify({ ...BOOTSTRAP, extra_specs: { min_count: 2 }, unknown: 1 }));
    expect(parsed.pool_id).toBe('pool-A');
  });

  test('rejects malformed JSON', () => {
    expect(() => parseBootstrapInput('{')).toThrow(/^failed to decode bootstrap params: /);
  });

  test('rejects a request missing required fields', () => {
    const { flavor: _flavor, ...partial } = BOOTSTRAP;
    expect(() => parseBootstrapInput(JSON.stringify(partial))).toThrow(/^invalid bootstrap params: /);
  });
});

describe('exitCodeFor', () => {
  test('not found maps to the orchestrator code', () => {
    expect(exitCodeFor(notFound('instance', 'runner-1'))).toBe(EXIT_NOT_FOUND);
    expect(EXIT_NOT_FOUND).toBe(30);
  });

  test('everything else is a plain failure', () => {
    expect(exitCodeFor(invalidArgument('missing GARM_COMMAND'))).toBe(EXIT_FAILURE);
    expect(exitCodeFor(new Error('boom'))).toBe(1);
  });
});
