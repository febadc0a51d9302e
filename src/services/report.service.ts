import type { StorageBackend } from '../storage/storage.backend';
import type {
  AnalyzerStatus,
  ComponentType,
  JsonValue,
  ReportSection,
  ReviewReport,
} from '../types';
import { COMPONENT_TYPES } from '../types';

export type ReportFormat = 'markdown' | 'json' | 'html';

export const REPORT_FORMATS: readonly ReportFormat[] = ['markdown', 'json', 'html'];

export const SECTION_TITLES: Record<ComponentType, string> = {
  quota: 'Service Quotas',
  metrics: 'Contact Metrics',
  phone: 'Phone Numbers',
  flow: 'Contact Flows',
  cloudtrail: 'API Activity',
  logs: 'Log Insights',
};

export const unavailableNotice = (componentType: ComponentType) => `${componentType} data unavailable`;

export interface AssembleInput {
  reviewId: string;
  analyzers: Partial<Record<ComponentType, AnalyzerStatus>>;
  daysBack?: number;
}

/**
 * Builds the review report from whatever results exist. Every expected
 * analyzer gets a section: populated when its record is readable, otherwise
 * an explicit "unavailable" notice.
 */
export class ReportService {
  private storage: StorageBackend;
  private now: () => Date;

  constructor(storage: StorageBackend, now: () => Date = () => new Date()) {
    this.storage = storage;
    this.now = now;
  }

  async assemble(input: AssembleInput): Promise<ReviewReport> {
    const { reviewId, analyzers, daysBack } = input;
    const warnings: string[] = [];

    const results = await this.storage.getAll(reviewId);
    let found: Partial<Record<ComponentType, JsonValue>> = {};
    if (results.success) {
      found = results.value;
    } else {
      warnings.push(`Results could not be read: ${results.error.message}`);
    }

    const sections: ReportSection[] = COMPONENT_TYPES.filter((type) => analyzers[type] !== undefined).map(
      (componentType): ReportSection => {
        const status = analyzers[componentType] ?? 'pending';
        const data = found[componentType];
        const title = SECTION_TITLES[componentType];

        if (data === undefined) {
          return { componentType, title, status, available: false, notice: unavailableNotice(componentType) };
        }
        return { componentType, title, status, available: true, data };
      }
    );

    const missing = sections.filter((section) => !section.available).length;
    console.log(
      `Assembled report for review ${reviewId}: ${sections.length - missing} populated, ${missing} unavailable`
    );

    return {
      reviewId,
      generatedAt: this.now().toISOString(),
      daysBack,
      sections,
      warnings,
    };
  }

  render(report: ReviewReport, format: ReportFormat): string {
    switch (format) {
      case 'json':
        return this.generateJSON(report);
      case 'html':
        return this.generateHTML(report);
      case 'markdown':
      default:
        return this.generateMarkdown(report);
    }
  }

  generateMarkdown(report: ReviewReport): string {
    let markdown = '';

    markdown += `# Operational Review ${report.reviewId}\n\n`;
    if (report.daysBack !== undefined) {
      markdown += `**Period:** last ${report.daysBack} days\n`;
    }
    markdown += `**Generated:** ${report.generatedAt}\n\n`;

    for (const warning of report.warnings) {
      markdown += `> ${warning}\n\n`;
    }

    for (const section of report.sections) {
      markdown += `## ${section.title}\n\n`;
      markdown += `**Status:** ${section.status}\n\n`;
      if (section.available) {
        markdown += '```json\n' + JSON.stringify(section.data, null, 2) + '\n```\n\n';
      } else {
        markdown += `_${section.notice}_\n\n`;
      }
    }

    return markdown;
  }

  generateJSON(report: ReviewReport): string {
    return JSON.stringify(
      {
        metadata: {
          generatedAt: report.generatedAt,
          version: '1.0',
        },
        ...report,
      },
      null,
      2
    );
  }

  generateHTML(report: ReviewReport): string {
    const sections = report.sections
      .map((section) => {
        const body = section.available
          ? `<pre>${escapeHtml(JSON.stringify(section.data, null, 2))}</pre>`
          : `<p class="unavailable">${escapeHtml(section.notice)}</p>`;
        return `
        <div class="section">
            <h2>${escapeHtml(section.title)}</h2>
            <span class="status status-${section.status}">${section.status}</span>
            ${body}
        </div>`;
      })
      .join('');

    const warnings = report.warnings
      .map((warning) => `<p class="warning">${escapeHtml(warning)}</p>`)
      .join('');

    return `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <title>Operational Review - ${escapeHtml(report.reviewId)}</title>
    <style>
        body { font-family: Arial, sans-serif; margin: 20px; background: #f5f5f5; color: #333; }
        .container { max-width: 1200px; margin: 0 auto; background: white; padding: 30px; }
        h2 { border-bottom: 2px solid #ddd; padding-bottom: 5px; }
        .status { display: inline-block; padding: 2px 10px; border-radius: 4px; font-size: 12px; font-weight: 600; }
        .status-succeeded { background: #d1fae5; color: #065f46; }
        .status-failed { background: #fee2e2; color: #991b1b; }
        .status-timed-out { background: #fef3c7; color: #92400e; }
        .unavailable { color: #6b7280; font-style: italic; }
        .warning { color: #991b1b; }
        pre { background: #f3f4f6; padding: 15px; overflow-x: auto; }
    </style>
</head>
<body>
    <div class="container">
        <h1>Operational Review ${escapeHtml(report.reviewId)}</h1>
        <p>Generated ${escapeHtml(report.generatedAt)}</p>
        ${warnings}${sections}
    </div>
</body>
</html>
`;
  }

  getFileExtension(format: ReportFormat): string {
    const extensions: Record<ReportFormat, string> = {
      markdown: 'md',
      json: 'json',
      html: 'html',
    };
    return extensions[format];
  }

  getMimeType(format: ReportFormat): string {
    const mimeTypes: Record<ReportFormat, string> = {
      markdown: 'text/markdown',
      json: 'application/json',
      html: 'text/html',
    };
    return mimeTypes[format];
  }
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}
