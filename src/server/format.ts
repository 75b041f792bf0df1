import type { AnalysisResult, HealthReport, ReportResult, RuleInfo, Severity, Suggestion } from '../shared/types.js';

const SEVERITY_ICONS: Record<Severity, string> = {
  error: '❌',
  warning: '⚠️',
  info: 'ℹ️'
};

export function formatLocation(suggestion: Pick<Suggestion, 'line' | 'column'>): string {
  if (suggestion.line === null) return 'unknown location';
  if (suggestion.column === null) return `line ${suggestion.line}`;
  return `line ${suggestion.line}, col ${suggestion.column}`;
}

export function formatSuggestion(suggestion: Suggestion, index: number): string {
  const icon = SEVERITY_ICONS[suggestion.severity];
  return `${index + 1}. ${icon} **${suggestion.severity}** \`${suggestion.ruleId}\` (${formatLocation(suggestion)}): ${suggestion.message}`;
}

function formatSuggestionList(suggestions: Suggestion[]): string {
  if (suggestions.length === 0) return '✅ No issues found.';
  return suggestions.map(formatSuggestion).join('\n');
}

function summary(result: AnalysisResult): string {
  return [
    `- **Fingerprint:** \`${result.fingerprint.slice(0, 12)}\``,
    `- **Suggestions:** ${result.suggestions.length}`,
    `- **Analysis time:** ${result.analysisTimeMs.toFixed(2)}ms${result.cached ? ' (cached)' : ''}`
  ].join('\n');
}

export function formatAnalysisMarkdown(result: AnalysisResult): string {
  return `# 🔍 Python Analysis Results

## Summary
${summary(result)}

## Suggestions
${formatSuggestionList(result.suggestions)}`;
}

export function formatReportMarkdown(result: ReportResult): string {
  let report: string;
  if (result.prioritizedReport) {
    report = result.prioritizedReport;
  } else if (result.enrichmentError) {
    report = `⚠️ ${result.enrichmentError}`;
  } else {
    report = 'ℹ️ No model provider is configured. Showing raw suggestions only.';
  }

  return `# 📝 Python Improvement Report

## Summary
${summary(result)}
- **Model:** ${result.modelUsed}

## Prioritized Recommendations
${report}

## Raw Suggestions
${formatSuggestionList(result.suggestions)}`;
}

export function formatRulesMarkdown(rules: RuleInfo[]): string {
  const lines = rules.map((rule, index) => `${index + 1}. \`${rule.id}\`: ${rule.description}`);
  return `# 📋 Active Rules (${rules.length})

${lines.length > 0 ? lines.join('\n') : 'No rules are enabled.'}`;
}

export function formatHealthMarkdown(report: HealthReport, detailed = false): string {
  const mark = (ok: boolean) => (ok ? '✅' : '⚠️');
  const sections = [
    `# 🏥 pylens Health Check

## System Status: ${report.status === 'ok' ? 'HEALTHY ✅' : 'DEGRADED ⚠️'}

### 📊 Components
- **Cache:** ${mark(report.cache === 'ok')} ${report.cache}
- **Persistence:** ${mark(report.persistence !== 'error')} ${report.persistence}
- **Model provider:** ${report.modelProvider}
- **Rules loaded:** ${report.rulesLoaded}
- **Service level:** ${report.serviceLevel}`
  ];

  if (detailed && report.metrics) {
    const m = report.metrics;
    sections.push(`### ⏱️ Metrics
- **Analyses:** ${m.analyses}
- **Cache hit rate:** ${(m.cacheHitRate * 100).toFixed(1)}%
- **Average analysis time:** ${m.averageAnalysisTimeMs.toFixed(2)}ms
- **Uptime:** ${Math.floor(m.uptimeMs / 1000)}s`);
  }

  return sections.join('\n\n');
}
