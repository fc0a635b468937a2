import type { ReleaseRecord } from '../release_types';
import { buildReleasePage } from './release_page';
import type { AppSection, ReleasePage, ReleaseRenderer, RenderContext, RenderFormat } from './renderer.types';

const XML_ENTITIES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeXml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => XML_ENTITIES[char] ?? char);
}

function list(tag: 'ul' | 'ol', items: readonly string[]): string {
  return `<${tag}>${items.map((item) => `<li>${escapeXml(item)}</li>`).join('')}</${tag}>`;
}

/**
 * Confluence storage format (XHTML). Every value is escaped.
 */
export class StorageFormatRenderer implements ReleaseRenderer {
  readonly format: RenderFormat = 'storage';

  render(releases: readonly ReleaseRecord[], context: RenderContext): string {
    const page = buildReleasePage(releases, context);
    const parts: string[] = [
      `<h1>${escapeXml(page.title)}</h1>`,
      `<p>Releases for the period <strong>${page.periodStart}</strong> to <strong>${page.periodEnd}</strong></p>`,
    ];

    if (page.sections.length === 0) {
      parts.push(`<p><em>No releases found in the last ${page.windowDays} days.</em></p>`);
    } else {
      for (const section of page.sections) {
        parts.push(this.renderSection(section), '<hr />');
      }
    }

    parts.push(this.renderFooter(page));
    return parts.join('\n');
  }

  private renderSection(section: AppSection): string {
    const parts: string[] = [
      `<h2>${section.index}. ${escapeXml(section.app)}</h2>`,
      `<ul>${section.fields
        .map((field) => `<li><strong>${escapeXml(field.label)}:</strong> ${escapeXml(field.value)}</li>`)
        .join('')}</ul>`,
    ];

    if (section.keyChanges.length > 0) {
      const notes = section.hiddenKeyChanges > 0
        ? [...section.keyChanges, `+${section.hiddenKeyChanges} more`]
        : section.keyChanges;
      parts.push('<p><strong>Key changes:</strong></p>', list('ul', notes));
    }

    if (section.timeline.length > 0) {
      parts.push('<p><strong>Timeline:</strong></p>', list('ul', section.timeline));
    }

    return parts.join('\n');
  }

  private renderFooter(page: ReleasePage): string {
    return [
      '<h2>Rollout process</h2>',
      '<p>Every release goes through these stages:</p>',
      list('ol', page.rolloutProcess),
      '<hr />',
      `<p><em>Updated automatically: ${page.updatedAt}</em></p>`,
    ].join('\n');
  }
}
