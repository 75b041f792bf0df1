import type { AnalysisResult, HealthReport, RuleInfo, Suggestion } from '../shared/types.js';

export class CLIFormatter {
  static formatAnalysisResult(result: AnalysisResult, source: string): string {
    const timing = `${result.analysisTimeMs.toFixed(2)}ms${result.cached ? ', cached' : ''}`;
    if (result.suggestions.length === 0) {
      return `${source}: no issues found (${timing})`;
    }

    const count = result.suggestions.length;
    const header = `${source}: ${count} suggestion${count === 1 ? '' : 's'} (${timing})`;
    return [header, ...result.suggestions.map(s => this.formatSuggestion(s))].join('\n');
  }

  static formatSuggestion(suggestion: Suggestion): string {
    const position = `${suggestion.line ?? '-'}:${suggestion.column ?? '-'}`;
    return `  ${position.padEnd(8)} ${suggestion.severity.padEnd(7)}  ${suggestion.ruleId.padEnd(26)} ${suggestion.message}`;
  }

  static formatRules(rules: RuleInfo[]): string {
    if (rules.length === 0) return 'No rules are enabled.';
    return rules.map(rule => `${rule.id.padEnd(26)} ${rule.description}`).join('\n');
  }

  static formatHealth(report: HealthReport): string {
    return [
      `status:          ${report.status}`,
      `cache:           ${report.cache}`,
      `persistence:     ${report.persistence}`,
      `model provider:  ${report.modelProvider}`,
      `rules loaded:    ${report.rulesLoaded}`,
      `service level:   ${report.serviceLevel}`
    ].join('\n');
  }

  static formatJson(value: unknown): string {
    return JSON.stringify(value, null, 2);
  }
}
