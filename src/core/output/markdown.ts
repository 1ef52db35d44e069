import { writeFile, mkdir } from 'fs/promises';
import { dirname } from 'path';
import type { CompilationEntry, ReportBookmark, ReportInput } from '../../types/index.js';
import { formatTimestamp } from '../pipeline/index.js';

export interface ReportOptions {
  title: string;
}

export class ReportGenerator {
  generate(input: ReportInput, options: ReportOptions): string {
    const sections = [
      this.generateHeader(input, options.title),
      this.generateChapters(input.entries),
      this.generateVideos(input.entries),
      this.generateBookmarks(input.bookmarks),
    ].filter((section) => section.length > 0);

    return `${sections.join('\n\n')}\n`;
  }

  private generateHeader(input: ReportInput, title: string): string {
    return `# ${title}

- **Period**: ${input.startDate} to ${input.endDate}
- **Videos**: ${input.entries.length}
- **Total duration**: ${formatTimestamp(input.totalSeconds)}`;
  }

  private generateChapters(entries: CompilationEntry[]): string {
    if (entries.length === 0) {
      return '## Chapters\n\nNo videos were compiled for this period.';
    }

    const lines = entries.map((entry) => `- ${entry.timestamp} ${escapeMarkdown(entry.title)}`);
    return `## Chapters\n\n${lines.join('\n')}`;
  }

  private generateVideos(entries: CompilationEntry[]): string {
    if (entries.length === 0) return '';

    const blocks = entries.map((entry) => {
      const lines = [`### ${entry.index}. ${escapeMarkdown(entry.title)}`, ''];
      if (entry.url) lines.push(`- **Link**: ${entry.url}`);
      if (entry.uploader) lines.push(`- **Uploader**: ${escapeMarkdown(entry.uploader)}`);
      lines.push(`- **Starts at**: ${entry.timestamp}`);
      lines.push(`- **Duration**: ${entry.duration}`);
      return lines.join('\n');
    });

    return `## Videos\n\n${blocks.join('\n\n')}`;
  }

  private generateBookmarks(bookmarks: ReportBookmark[]): string {
    if (bookmarks.length === 0) return '';

    const lines = bookmarks.map((bookmark) => {
      if (!bookmark.url) {
        return `- ${escapeMarkdown(bookmark.title) || 'Untitled'} (${bookmark.createdAt})`;
      }
      const label = bookmark.title ? escapeMarkdown(bookmark.title) : bookmark.url;
      return `- [${label}](${bookmark.url}) (${bookmark.createdAt})`;
    });

    return `## Bookmarks\n\n${lines.join('\n')}`;
  }

  async writeToFile(content: string, outputPath: string): Promise<void> {
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, content, 'utf-8');
  }
}

export function escapeMarkdown(text: string): string {
  return text.replace(/\s+/g, ' ').trim().replace(/([\\`*_[\]#<>])/g, '\\$1');
}
