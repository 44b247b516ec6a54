import type { Finding, GlobalContext, Severity } from '../../types.js';

const SEVERITY_LABELS: Record<Severity, string> = {
  critical: '🔴 Critical',
  warning: '🟡 Warning',
  info: '🔵 Info',
};

export function formatCommentBody(finding: Finding, coerced: { line: number } | null = null): string {
  const sections: string[] = [`**${SEVERITY_LABELS[finding.severity]}**: ${finding.message}`];

  if (coerced) {
    sections.push('');
    sections.push(`_Line ${coerced.line} is outside the diff; this comment applies to the file._`);
  }

  if (finding.suggestion) {
    sections.push('');
    sections.push(`💡 **Suggestion**: ${finding.suggestion}`);
  }

  return sections.join('\n');
}

export interface UnreviewedFile {
  filePath: string;
  reason: string;
}

export function formatSummaryBody(input: {
  context: GlobalContext;
  findings: readonly Finding[];
  unreviewed: readonly UnreviewedFile[];
}): string {
  const sections: string[] = ['## 🤖 Automated Review', ''];

  sections.push(input.context.text.length > 0 ? input.context.text : '_Pull request overview unavailable._');
  sections.push('');

  if (input.findings.length === 0) {
    sections.push('No actionable issues found.');
  } else {
    sections.push('### Findings');
    sections.push('');
    sections.push('| Severity | Count |');
    sections.push('| --- | --- |');
    for (const severity of ['critical', 'warning', 'info'] as const) {
      const count = input.findings.filter((finding) => finding.severity === severity).length;
      sections.push(`| ${SEVERITY_LABELS[severity]} | ${count} |`);
    }
  }

  if (input.unreviewed.length > 0) {
    sections.push('');
    sections.push('### Not reviewed');
    sections.push('');
    for (const file of input.unreviewed) {
      sections.push(`- \`${file.filePath}\`: ${file.reason}`);
    }
  }

  return sections.join('\n');
}
