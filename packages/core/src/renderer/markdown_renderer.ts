import type { ReleaseRecord } from '../release_types';
import { buildReleasePage } from './release_page';
import type { AppSection, ReleasePage, ReleaseRenderer, RenderContext, RenderFormat } from './renderer.types';

/**
 * Markdown rendering of the release page, for previews in the terminal.
 */
export class MarkdownRenderer implements ReleaseRenderer {
  readonly format: RenderFormat = 'markdown';

  render(releases: readonly ReleaseRecord[], context: RenderContext): string {
    const page = buildReleasePage(releases, context);
    const lines: string[] = [
      `# ${page.title}`,
      '',
      `## Releases for the period ${page.periodStart} to ${page.periodEnd}`,
      '',
    ];

    if (page.sections.length === 0) {
      lines.push(`_No releases found in the last ${page.windowDays} days._`, '');
    } else {
      for (const section of page.sections) {
        lines.push(...this.renderSection(section), '---', '');
      }
    }

    lines.push(...this.renderFooter(page));
    return lines.join('\n');
  }

  private renderSection(section: AppSection): string[] {
    const lines = [`### ${section.index}. ${section.app}`, ''];
    lines.push(...section.fields.map((field) => `- **${field.label}:** ${field.value}`), '');

    if (section.keyChanges.length > 0) {
      lines.push('**Key changes:**', ...section.keyChanges.map((note) => `- ${note}`));
      if (section.hiddenKeyChanges > 0) {
        lines.push(`- +${section.hiddenKeyChanges} more`);
      }
      lines.push('');
    }

    if (section.timeline.length > 0) {
      lines.push('**Timeline:**', ...section.timeline.map((event) => `- ${event}`), '');
    }

    return lines;
  }

  private renderFooter(page: ReleasePage): string[] {
    return [
      '## Rollout process',
      '',
      'Every release goes through these stages:',
      '',
      ...page.rolloutProcess.map((stage, index) => `${index + 1}. ${stage}`),
      '',
      '---',
      '',
      `*Updated automatically: ${page.updatedAt}*`,
      '',
    ];
  }
}
