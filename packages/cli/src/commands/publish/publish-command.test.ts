// Mock DependencyInjectionService
jest.mock('../../services/dependency-injection', () => ({
  DependencyInjectionService: {
    getInstance: jest.fn()
  }
}));

import { PublishCommand } from './publish-command';
import { DependencyInjectionService } from '../../services/dependency-injection';
import { Config } from '@release-digest/core';
import type { Releases, Tracker } from '@release-digest/core';

// Mock console methods
const mockConsoleLog = jest.spyOn(console, 'log').mockImplementation();
const mockConsoleError = jest.spyOn(console, 'error').mockImplementation();
const mockProcessExit = jest.spyOn(process, 'exit').mockImplementation();

const mockDI = jest.mocked(DependencyInjectionService);

function release(app: string, version: string, rollout?: string): Releases.ReleaseRecord {
  return {
    app,
    version,
    rollout,
    status: 'In production',
    keyChanges: [],
    timeline: [],
    published: '2024-03-05 09:13 UTC',
    timestamp: 1709630000,
  };
}

const config: Config.ReleaseDigestConfig = {
  slack: { token: 'test-token', channelId: 'C033MFEDQ2C' },
  confluence: { email: 'bot@example.com', apiToken: 'test-secret', cloudId: 'cloud-1', pageId: '42' },
  windowDays: 3,
  rulesFile: null,
  httpTimeoutMs: 30000,
  logLevel: null,
  dryRun: false,
};

const releases = [
  release('Spades', '2.5.3', '100%'),
  release('Hearts', '1.2.0'),
  release('Dominoes', '1.4.0'),
  release('Mahjong', '3.0.0'),
  release('FreeCell', '2.0.1'),
  release('Gin Rummy', '4.1.0'),
];

const published: Tracker.RunResult = {
  releases,
  markup: '<h1>Releases - Last 3 days</h1>',
  format: 'storage',
  generatedAt: new Date(Date.UTC(2024, 2, 8, 12, 0)),
  oldest: 1709640000,
  counts: { messages: 20, threads: 7, records: 12, accepted: 8 },
  publish: { pageId: '42', title: 'Mobile releases', previousVersion: 3, version: 4 },
};

let mockTracker: {
  run: jest.MockedFunction<(options: Tracker.RunOptions) => Promise<Tracker.RunResult>>;
};
let mockLoadConfig: jest.MockedFunction<(overrides: Config.ConfigOverrides) => Config.ReleaseDigestConfig>;
let mockGetReleaseTracker: jest.Mock;

describe('PublishCommand', () => {
  let publishCommand: PublishCommand;

  beforeEach(() => {
    jest.clearAllMocks();

    mockTracker = { run: jest.fn().mockResolvedValue(published) };
    mockLoadConfig = jest.fn().mockReturnValue(config);
    mockGetReleaseTracker = jest.fn().mockReturnValue(mockTracker);

    mockDI.getInstance.mockReturnValue({
      loadConfig: mockLoadConfig,
      getReleaseTracker: mockGetReleaseTracker,
    } as unknown as DependencyInjectionService);

    publishCommand = new PublishCommand();
  });

  it('should map flags to configuration overrides and run options', async () => {
    await publishCommand.execute({ days: 3, channel: 'C0OTHER', pageId: '42', rules: 'rules.yaml' });

    expect(mockLoadConfig).toHaveBeenCalledWith({
      channelId: 'C0OTHER',
      windowDays: 3,
      pageId: '42',
      rulesFile: 'rules.yaml',
      dryRun: undefined,
    });
    expect(mockTracker.run).toHaveBeenCalledWith({
      windowDays: 3,
      pageId: '42',
      dryRun: false,
      format: undefined,
    });
    expect(mockProcessExit).not.toHaveBeenCalled();
  });

  it('should print the top five releases and the version transition', async () => {
    await publishCommand.execute({});

    const lines = mockConsoleLog.mock.calls.map((call) => call[0]);
    expect(lines).toEqual([
      '🔍 Collecting releases from the last 3 days...',
      '✅ Found 6 releases (20 messages, 7 threads)',
      '  • Spades 2.5.3 - 2024-03-05 09:13 UTC (100%)',
      '  • Hearts 1.2.0 - 2024-03-05 09:13 UTC (N/A)',
      '  • Dominoes 1.4.0 - 2024-03-05 09:13 UTC (N/A)',
      '  • Mahjong 3.0.0 - 2024-03-05 09:13 UTC (N/A)',
      '  • FreeCell 2.0.1 - 2024-03-05 09:13 UTC (N/A)',
      '  ... and 1 more',
      '✅ Page 42 updated (v3 → v4)',
    ]);
  });

  it('should print the preview on a dry run', async () => {
    mockLoadConfig.mockReturnValue({ ...config, confluence: null, dryRun: true });
    mockTracker.run.mockResolvedValue({
      ...published,
      releases: [releases[0] ?? release('Spades', '2.5.3')],
      format: 'markdown',
      markup: '# Releases - Last 3 days',
      publish: null,
    });

    await publishCommand.execute({ dryRun: true, format: 'markdown' });

    expect(mockTracker.run).toHaveBeenCalledWith({
      windowDays: 3,
      pageId: undefined,
      dryRun: true,
      format: 'markdown',
    });
    const lines = mockConsoleLog.mock.calls.map((call) => call[0]);
    expect(lines.slice(-3)).toEqual(['🧪 Dry run: page not updated', '', '# Releases - Last 3 days']);
  });

  it('should print JSON when requested', async () => {
    await publishCommand.execute({ json: true });

    expect(mockConsoleLog).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(mockConsoleLog.mock.calls[0]?.[0]))).toEqual({
      success: true,
      data: {
        releases: JSON.parse(JSON.stringify(releases)),
        counts: published.counts,
        publish: published.publish,
      },
    });
  });

  it('should pass the log level implied by the flags', async () => {
    await publishCommand.execute({ verbose: true });
    await publishCommand.execute({ quiet: true });

    expect(mockGetReleaseTracker).toHaveBeenNthCalledWith(1, config, 'debug');
    expect(mockGetReleaseTracker).toHaveBeenNthCalledWith(2, config, 'warn');
  });

  it('should print nothing but errors when quiet', async () => {
    await publishCommand.execute({ quiet: true });

    expect(mockConsoleLog).not.toHaveBeenCalled();
  });

  it('should report configuration errors and exit 1', async () => {
    mockLoadConfig.mockImplementation(() => {
      throw new Config.ConfigurationError('Missing required settings: SLACK_TOKEN', 'MISSING_SETTINGS', ['SLACK_TOKEN']);
    });

    await publishCommand.execute({});

    expect(mockConsoleError).toHaveBeenCalledWith('❌ Missing required settings: SLACK_TOKEN');
    expect(mockTracker.run).not.toHaveBeenCalled();
    expect(mockProcessExit).toHaveBeenCalledWith(1);
  });

  it('should report run failures as JSON', async () => {
    mockTracker.run.mockRejectedValue(new Error('Conflict writing page 42 (version changed)'));

    await publishCommand.execute({ json: true });

    expect(JSON.parse(String(mockConsoleLog.mock.calls[0]?.[0]))).toEqual({
      success: false,
      error: 'Conflict writing page 42 (version changed)',
      exitCode: 1,
    });
    expect(mockProcessExit).toHaveBeenCalledWith(1);
  });

  it('should add the stack with --verbose', async () => {
    mockTracker.run.mockRejectedValue(new Error('Slack conversations.history error: invalid_auth'));

    await publishCommand.execute({ verbose: true });

    expect(mockConsoleError).toHaveBeenNthCalledWith(1, '❌ Slack conversations.history error: invalid_auth');
    expect(mockConsoleError).toHaveBeenNthCalledWith(2, expect.stringContaining('🔍 Technical details: Error: Slack'));
  });
});
