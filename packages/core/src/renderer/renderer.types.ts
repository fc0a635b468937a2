import type { ReleaseRecord } from '../release_types';

export type RenderFormat = 'storage' | 'markdown';

export const RENDER_FORMATS: readonly RenderFormat[] = ['storage', 'markdown'];

export type RenderContext = {
  /** Moment the page is generated; also the end of the reported period */
  generatedAt: Date;
  /** Lookback window the releases were collected from */
  windowDays: number;
  /** Change notes shown per app before the "+N more" line (default 5) */
  maxKeyChanges?: number;
  /** Page heading; defaults to "Releases - Last {n} days" */
  title?: string;
};

export interface ReleaseRenderer {
  readonly format: RenderFormat;
  render(releases: readonly ReleaseRecord[], context: RenderContext): string;
}

export type FieldLine = {
  label: string;
  value: string;
};

/**
 * Everything shown for one app, latest record first.
 */
export type AppSection = {
  index: number;
  app: string;
  fields: FieldLine[];
  keyChanges: string[];
  hiddenKeyChanges: number;
  timeline: string[];
};

export type ReleasePage = {
  title: string;
  periodStart: string;
  periodEnd: string;
  windowDays: number;
  sections: AppSection[];
  rolloutProcess: readonly string[];
  updatedAt: string;
};
