// Mock DependencyInjectionService
jest.mock('../../services/dependency-injection', () => ({
  DependencyInjectionService: {
    getInstance: jest.fn()
  }
}));

import { Command } from 'commander';
import { ParseCommand } from './parse-command';
import { DependencyInjectionService } from '../../services/dependency-injection';
import { Tracker } from '@release-digest/core';
import type { Releases } from '@release-digest/core';
import { MemoryMessageSource, MemoryPageSink, MessageExportError, readMessageExport } from '@release-digest/core/memory';

// Mock console methods
const mockConsoleLog = jest.spyOn(console, 'log').mockImplementation();
const mockConsoleError = jest.spyOn(console, 'error').mockImplementation();
const mockProcessExit = jest.spyOn(process, 'exit').mockImplementation();

const mockDI = jest.mocked(DependencyInjectionService);

const messages = readMessageExport([
  {
    ts: '1709630000.000100',
    text: 'Spades\nVersion: 2.5.3\nRollout: 100%',
    replies: [{ ts: '1709630100.000100', text: 'QA checked' }],
  },
  { ts: '1709620000.000100', text: 'Hi team, new build is ready!' },
]);

let mockLoadMessageExport: jest.MockedFunction<(filePath: string) => Releases.RawMessage[]>;
let mockGetOfflineTracker: jest.Mock;

describe('ParseCommand', () => {
  let parseCommand: ParseCommand;

  beforeEach(() => {
    jest.clearAllMocks();

    mockLoadMessageExport = jest.fn().mockReturnValue(messages);
    mockGetOfflineTracker = jest.fn((items: Releases.RawMessage[]) => Tracker.createReleaseTracker({
      source: new MemoryMessageSource(items),
      sink: new MemoryPageSink(),
    }));

    mockDI.getInstance.mockReturnValue({
      loadMessageExport: mockLoadMessageExport,
      getOfflineTracker: mockGetOfflineTracker,
    } as unknown as DependencyInjectionService);

    parseCommand = new ParseCommand();
  });

  it('should list the releases found in the export', async () => {
    await parseCommand.execute({ file: 'export.json' });

    expect(mockLoadMessageExport).toHaveBeenCalledWith('export.json');
    expect(mockGetOfflineTracker).toHaveBeenCalledWith(messages, null, undefined);
    expect(mockConsoleLog.mock.calls.map((call) => call[0])).toEqual([
      '✅ Found 1 releases (3 messages, 1 threads)',
      '  • Spades 2.5.3 - 2024-03-05 09:13 UTC (100%)',
    ]);
    expect(mockProcessExit).not.toHaveBeenCalled();
  });

  it('should pass the rules file and log level through', async () => {
    await parseCommand.execute({ file: 'export.json', rules: 'rules.yaml', verbose: true });

    expect(mockGetOfflineTracker).toHaveBeenCalledWith(messages, 'rules.yaml', 'debug');
  });

  it('should print the rendered page', async () => {
    await parseCommand.execute({ file: 'export.json', render: 'markdown' });

    const output = String(mockConsoleLog.mock.calls[0]?.[0]);
    expect(output.split('\n').slice(0, 5)).toEqual([
      '# Releases - Last 1 days',
      '',
      '## Releases for the period 2024-03-04 to 2024-03-05',
      '',
      '### 1. Spades',
    ]);
  });

  it('should print JSON when requested', async () => {
    await parseCommand.execute({ file: 'export.json', json: true });

    const payload = JSON.parse(String(mockConsoleLog.mock.calls[0]?.[0]));
    expect(payload.success).toBe(true);
    expect(payload.data.counts).toEqual({ messages: 3, threads: 1, records: 2, accepted: 1 });
    expect(payload.data.releases).toHaveLength(1);
    expect(payload.data.releases[0]).toMatchObject({
      app: 'Spades',
      version: '2.5.3',
      rollout: '100%',
      timeline: ['QA checked'],
    });
  });

  it('should report unreadable exports and exit 1', async () => {
    mockLoadMessageExport.mockImplementation(() => {
      throw new MessageExportError('Invalid message export', ['/0 must have required property \'ts\'']);
    });

    await parseCommand.execute({ file: 'broken.json' });

    expect(mockConsoleError).toHaveBeenCalledWith("❌ Invalid message export: /0 must have required property 'ts'");
    expect(mockGetOfflineTracker).not.toHaveBeenCalled();
    expect(mockProcessExit).toHaveBeenCalledWith(1);
  });

  describe('command line', () => {
    function createProgram(): Command {
      const program = new Command()
        .exitOverride()
        .configureOutput({ writeOut: () => undefined, writeErr: () => undefined });
      parseCommand.register(program);
      return program;
    }

    it('should hand the file argument to execute', async () => {
      await createProgram().parseAsync(['node', 'release-digest', 'parse', 'export.json', '--json']);

      expect(mockLoadMessageExport).toHaveBeenCalledWith('export.json');
      const payload = JSON.parse(String(mockConsoleLog.mock.calls[0]?.[0]));
      expect(payload.data.counts.accepted).toBe(1);
    });

    it('should refuse render formats other than storage and markdown', async () => {
      await expect(
        createProgram().parseAsync(['node', 'release-digest', 'parse', 'export.json', '--render', 'html']),
      ).rejects.toMatchObject({ code: 'commander.invalidArgument' });
      expect(mockLoadMessageExport).not.toHaveBeenCalled();
    });
  });

  it('should require a file when executed directly', async () => {
    await parseCommand.execute({});

    expect(mockConsoleError).toHaveBeenCalledWith('❌ A message export file is required. Usage: release-digest parse <file>');
    expect(mockProcessExit).toHaveBeenCalledWith(1);
  });
});
