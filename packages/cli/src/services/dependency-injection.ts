import { Config, Logger, Rules, Tracker } from '@release-digest/core';
import type { Releases } from '@release-digest/core';
import { ConfluencePageSink, SlackMessageSource } from '@release-digest/core/http';
import { MemoryMessageSource, MemoryPageSink, loadMessageExportFile } from '@release-digest/core/memory';

/**
 * Dependency Injection Service for the release-digest CLI
 *
 * Builds configuration, matching rules and release trackers for commands.
 * Commands only talk to this service, so tests replace it with a mock.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private readonly rulesCache = new Map<string, Rules.MatchingRules>();

  private constructor() { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  /**
   * Loads configuration from the environment with command-line overrides.
   */
  loadConfig(overrides: Config.ConfigOverrides): Config.ReleaseDigestConfig {
    return Config.loadReleaseDigestConfig(process.env, overrides);
  }

  /**
   * Compiled matching rules: the bundled defaults, or a rules file merged over them.
   */
  getMatchingRules(rulesFile: string | null): Rules.MatchingRules {
    const key = rulesFile ?? '';
    const cached = this.rulesCache.get(key);
    if (cached) {
      return cached;
    }

    const config = rulesFile ? Rules.loadMatchingRulesFile(rulesFile) : Rules.DEFAULT_MATCHING_RULES_CONFIG;
    const rules = Rules.compileMatchingRules(config);
    this.rulesCache.set(key, rules);
    return rules;
  }

  /**
   * Tracker reading Slack and writing Confluence.
   */
  getReleaseTracker(config: Config.ReleaseDigestConfig, logLevel?: Logger.LogLevel): Tracker.ReleaseTrackerModule {
    const logger = Logger.createLogger('[release-digest] ', logLevel ?? config.logLevel ?? undefined);
    const source = new SlackMessageSource(
      {
        token: config.slack.token,
        channelId: config.slack.channelId,
        timeoutMs: config.httpTimeoutMs,
      },
      undefined,
      logger,
    );
    // Dry runs without Confluence settings never publish
    const sink = config.confluence
      ? new ConfluencePageSink(
        {
          email: config.confluence.email,
          apiToken: config.confluence.apiToken,
          cloudId: config.confluence.cloudId,
          timeoutMs: config.httpTimeoutMs,
        },
        undefined,
        logger,
      )
      : new MemoryPageSink();

    return Tracker.createReleaseTracker({
      source,
      sink,
      rules: this.getMatchingRules(config.rulesFile),
      logger,
    });
  }

  /**
   * Tracker over messages read from an export file. Nothing leaves the process.
   */
  getOfflineTracker(messages: Releases.RawMessage[], rulesFile: string | null, logLevel?: Logger.LogLevel): Tracker.ReleaseTrackerModule {
    return Tracker.createReleaseTracker({
      source: new MemoryMessageSource(messages),
      sink: new MemoryPageSink(),
      rules: this.getMatchingRules(rulesFile),
      logger: Logger.createLogger('[release-digest] ', logLevel),
    });
  }

  loadMessageExport(filePath: string): Releases.RawMessage[] {
    return loadMessageExportFile(filePath);
  }
}
