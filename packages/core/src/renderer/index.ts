import { MarkdownRenderer } from './markdown_renderer';
import { StorageFormatRenderer } from './storage_format_renderer';
import type { ReleaseRenderer, RenderFormat } from './renderer.types';

export function createRenderer(format: RenderFormat): ReleaseRenderer {
  return format === 'markdown' ? new MarkdownRenderer() : new StorageFormatRenderer();
}

export { MarkdownRenderer } from './markdown_renderer';
export { StorageFormatRenderer, escapeXml } from './storage_format_renderer';
export { DEFAULT_MAX_KEY_CHANGES, ROLLOUT_PROCESS, buildReleasePage, groupByApp } from './release_page';
export { RENDER_FORMATS } from './renderer.types';
export type {
  AppSection,
  FieldLine,
  ReleasePage,
  ReleaseRenderer,
  RenderContext,
  RenderFormat,
} from './renderer.types';
