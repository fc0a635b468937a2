/**
 * Reply merger.
 *
 * Enriches a thread root's record with what the thread says later: explicit
 * app clarifications, rollout progress, build cards, QA and approval events,
 * and authoritative Status/Rollout corrections. Replies are applied oldest
 * first, so later replies win where a rule overwrites.
 */

import type { AppNameResolver } from '../app_name_resolver';
import {
  KEY_PATTERNS,
  createMessageText,
  findChangeNotes,
  findVersion,
  readKeyValue,
} from '../field_extractors';
import type { MessageText } from '../field_extractors';
import type { Logger } from '../logger';
import { createLogger } from '../logger';
import type { MatchingRules } from '../matching_rules';
import { ReleaseStatus, hasKnownStatus } from '../release_types';
import type { RawMessage, ReleaseFields, ReleaseRecord } from '../release_types';
import { VERSION_SOURCE } from '../utils/regexp_utils';

const APP_MARKER = /\bapp(?:\s+name)?\s*:\s*(.+)$/i;
const THIS_IS_MARKER = /\bthis is\s+(?:the\s+)?(.+?)\s*(?:[.,;!?]|$)/i;
const PERCENT_ROLLED_OUT = /(\d{1,3})\s*%\s*rolled out!/i;
const ROLLOUT_EMOJI = /:(?:(?:release|rollout)[-_]?(\d{1,3})(?:[-_]?(?:percent|pct))?|(\d{1,3})[-_]?percent):/i;
const VERSION_ROLLED_OUT = new RegExp(
  String.raw`\bVersion\s+v?(${VERSION_SOURCE})\b.*?\bRolled out to\s+(\d{1,3})\s*%`,
  'i',
);
const QA_CHECKED = /\bchecked\b/i;
const GREEN_LIGHT = /\bgreen[- ]?light(?:ed)?\b|\bapproved?\b|\blgtm\b/i;
const READY_FOR_SUBMISSION = /\bready for submission\b/i;

export const TimelineEvent = {
  QaChecked: 'QA checked',
  GreenLight: 'Green light',
  ReadyForSubmission: 'Ready for submission',
  Live: 'Live',
} as const;

/**
 * Rollout text for a percentage.
 */
export function formatRollout(percent: string | number): string {
  return Number(percent) === 100 ? '100% rolled out' : `${percent}% staged rollout`;
}

export function rolloutProgressEvent(percent: string | number): string {
  return `Rolled out to ${percent}%`;
}

type FillableField = 'version' | 'build' | 'platform';

function fillIfUnset(record: ReleaseFields, field: FillableField, value: string | null | undefined): void {
  if (record[field] === undefined && value) {
    record[field] = value;
  }
}

function findRolloutPercent(text: MessageText): string | undefined {
  const phrase = PERCENT_ROLLED_OUT.exec(text.normalized);
  if (phrase) {
    return phrase[1];
  }
  const emoji = ROLLOUT_EMOJI.exec(text.raw);
  return emoji ? emoji[1] ?? emoji[2] : undefined;
}

function appendEvent(record: ReleaseFields, event: string): void {
  if (record.timeline[record.timeline.length - 1] !== event) {
    record.timeline.push(event);
  }
}

export class ReplyMerger {
  private readonly platformRolledOut: RegExp;
  private readonly platformLive: RegExp;
  private readonly platformTag: RegExp;
  private readonly logger: Logger;

  constructor(
    private readonly resolver: AppNameResolver,
    rules: MatchingRules,
    logger?: Logger,
  ) {
    const platform = `(${rules.platformSource})`;
    const version = `v?(${VERSION_SOURCE})\\b`;
    this.platformRolledOut = new RegExp(`${platform}\\s+${version}.*?\\brolled out to\\s+(\\d{1,3})\\s*%`, 'i');
    this.platformLive = new RegExp(`${platform}\\s+${version}.*?\\bis live\\b`, 'i');
    this.platformTag = new RegExp(`\\[\\s*${platform}\\s*\\]`, 'gi');
    this.logger = logger ?? createLogger('[ReplyMerger] ');
  }

  /**
   * Returns the base record enriched by its replies. The base is not modified.
   */
  merge(base: ReleaseRecord, replies: readonly RawMessage[]): ReleaseRecord {
    const record: ReleaseRecord = {
      ...base,
      keyChanges: [...base.keyChanges],
      timeline: [...base.timeline],
    };
    const ordered = [...replies].sort((a, b) => a.ts - b.ts);

    let latestCandidate: string | null = null;
    const markers: string[] = [];

    for (const reply of ordered) {
      const text = createMessageText(reply.text);
      if (!text.raw) {
        continue;
      }

      const matchedFact = this.applyFacts(record, text);
      const candidate = this.findAppCandidate(text, matchedFact, markers);
      if (candidate) {
        latestCandidate = candidate;
      }
    }

    if (!this.resolver.isUsableName(record.app)) {
      const replaced = this.fallbackApp(ordered, latestCandidate, markers);
      if (replaced) {
        this.logger.debug(`App "${record.app ?? ''}" replaced by "${replaced}" from replies`);
        record.app = replaced;
      }
    }

    if (record.version === undefined) {
      const allText = ordered.map((reply) => createMessageText(reply.text).normalized).join('\n');
      const version = findVersion(allText);
      if (version) {
        record.version = version;
      }
    }

    return record;
  }

  /**
   * Applies every non-app rule to the record. True when any of them matched.
   */
  private applyFacts(record: ReleaseFields, text: MessageText): boolean {
    let matched = false;

    const rolledOut = this.platformRolledOut.exec(text.normalized);
    const versionRolledOut = rolledOut ? null : VERSION_ROLLED_OUT.exec(text.normalized);
    if (rolledOut) {
      fillIfUnset(record, 'platform', this.resolver.canonicalPlatform(rolledOut[1]) ?? rolledOut[1]);
      fillIfUnset(record, 'version', rolledOut[2]);
      if (rolledOut[3]) {
        record.rollout = formatRollout(rolledOut[3]);
      }
      matched = true;
    } else if (versionRolledOut) {
      fillIfUnset(record, 'version', versionRolledOut[1]);
      if (versionRolledOut[2]) {
        record.rollout = formatRollout(versionRolledOut[2]);
      }
      matched = true;
    }

    const live = this.platformLive.exec(text.normalized);
    if (live) {
      fillIfUnset(record, 'platform', this.resolver.canonicalPlatform(live[1]) ?? live[1]);
      fillIfUnset(record, 'version', live[2]);
      record.status = ReleaseStatus.InProduction;
      appendEvent(record, TimelineEvent.Live);
      matched = true;
    }

    const percent = findRolloutPercent(text);
    if (percent) {
      record.rollout = formatRollout(percent);
      appendEvent(record, rolloutProgressEvent(percent));
      matched = true;
    }

    if (this.applyBuildCard(record, text.lines)) {
      matched = true;
    }

    if (QA_CHECKED.test(text.normalized)) {
      appendEvent(record, TimelineEvent.QaChecked);
      matched = true;
    }
    if (GREEN_LIGHT.test(text.normalized)) {
      appendEvent(record, TimelineEvent.GreenLight);
      if (!hasKnownStatus(record.status)) {
        record.status = ReleaseStatus.ReadyForRollout;
      }
      matched = true;
    }
    if (READY_FOR_SUBMISSION.test(text.normalized)) {
      appendEvent(record, TimelineEvent.ReadyForSubmission);
      if (!hasKnownStatus(record.status)) {
        record.status = ReleaseStatus.ReadyForSubmission;
      }
      matched = true;
    }

    for (const line of text.lines) {
      const status = readKeyValue(line, KEY_PATTERNS.status);
      if (status) {
        record.status = status;
        matched = true;
      }
      const rollout = readKeyValue(line, KEY_PATTERNS.rollout);
      if (rollout) {
        record.rollout = rollout;
        matched = true;
      }
    }

    if (record.platform === undefined) {
      const tags = new Set<string>();
      const pattern = new RegExp(this.platformTag.source, this.platformTag.flags);
      let tag: RegExpExecArray | null;
      while ((tag = pattern.exec(text.normalized)) !== null) {
        const platform = tag[1];
        if (platform) {
          tags.add(this.resolver.canonicalPlatform(platform) ?? platform);
        }
      }
      if (tags.size === 1) {
        fillIfUnset(record, 'platform', [...tags][0]);
      }
    }

    return matched;
  }

  /**
   * "Build Version", "Build Number" and "Recent changes" lines fill what is
   * still unset.
   */
  private applyBuildCard(record: ReleaseFields, lines: readonly string[]): boolean {
    let matched = false;

    for (const line of lines) {
      const buildVersion = readKeyValue(line, KEY_PATTERNS.buildVersion);
      if (buildVersion) {
        fillIfUnset(record, 'version', findVersion(buildVersion));
        matched = true;
      }
      const buildNumber = readKeyValue(line, KEY_PATTERNS.buildNumber);
      if (buildNumber) {
        fillIfUnset(record, 'build', buildNumber);
        matched = true;
      }
    }

    const notes = findChangeNotes(lines);
    if (notes.length > 0) {
      if (record.keyChanges.length === 0) {
        record.keyChanges.push(...notes);
      }
      matched = true;
    }

    return matched;
  }

  /**
   * Resolved app named by the reply, if any. Explicit markers are remembered
   * for the final fallback. A single-line reply counts as a candidate only
   * when no other rule matched it.
   */
  private findAppCandidate(text: MessageText, matchedFact: boolean, markers: string[]): string | null {
    const explicit: string[] = [];
    for (const line of text.lines) {
      const app = APP_MARKER.exec(line)?.[1];
      if (app) {
        explicit.push(app);
      }
      const thisIs = THIS_IS_MARKER.exec(line)?.[1];
      if (thisIs) {
        explicit.push(thisIs);
      }
    }
    markers.push(...explicit);

    const candidates = [...explicit];
    const [onlyLine] = text.lines;
    if (text.lines.length === 1 && onlyLine !== undefined && !matchedFact) {
      candidates.push(onlyLine);
    }

    for (const candidate of candidates) {
      const app = this.resolver.resolve(candidate);
      if (app) {
        return app;
      }
    }
    return null;
  }

  private fallbackApp(replies: readonly RawMessage[], latestCandidate: string | null, markers: readonly string[]): string | null {
    if (latestCandidate) {
      return latestCandidate;
    }

    const allText = replies.map((reply) => createMessageText(reply.text).normalized).join('\n');
    const hint = this.resolver.matchHint(allText);
    if (hint) {
      return hint;
    }

    for (const marker of markers) {
      const name = this.resolver.clean(marker);
      if (this.resolver.isUsableName(name)) {
        return name;
      }
    }
    return null;
  }
}
