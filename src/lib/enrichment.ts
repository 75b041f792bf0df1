import { EnrichmentError, describeCause } from '../shared/errors.js';
import { silentLogger, type Logger } from '../shared/logger.js';
import { RetryManager, type RetryOptions } from '../shared/retry.js';
import type { EnrichmentRequest, EnrichmentResult, ReportEnricher, Suggestion } from '../shared/types.js';
import type { ChatMessage, ModelProvider } from './providers/types.js';

export const MAX_RECOMMENDATIONS = 5;

const SYSTEM_PROMPT = [
  'You are an experienced software engineer reviewing Python code.',
  'You focus on maintainability, readability and PEP 8 conformance.',
  'Base your review on the static analysis findings you are given; do not invent findings.'
].join(' ');

export function buildReportMessages(request: EnrichmentRequest): ChatMessage[] {
  const findings = request.suggestions.length > 0
    ? request.suggestions.map(formatFinding).join('\n')
    : '(no findings)';

  const user = [
    'Python code:',
    '```python',
    request.code,
    '```',
    '',
    'Static analysis findings:',
    findings,
    '',
    `Write a prioritized list of at most ${MAX_RECOMMENDATIONS} improvement recommendations.`,
    'For each one give a short justification and the expected impact.',
    'Answer in Markdown.'
  ].join('\n');

  return [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content: user }
  ];
}

function formatFinding(suggestion: Suggestion): string {
  const location = suggestion.line === null ? '' : ` (line ${suggestion.line})`;
  return `- [${suggestion.severity}] ${suggestion.ruleId}${location}: ${suggestion.message}`;
}

export interface ModelReportEnricherOptions {
  logger?: Logger;
  retry?: Partial<RetryOptions>;
}

/** Asks a chat model to turn raw suggestions into a prioritized report. */
export class ModelReportEnricher implements ReportEnricher {
  readonly provider: string;
  readonly model: string;
  private readonly logger: Logger;

  constructor(
    private readonly client: ModelProvider,
    private readonly options: ModelReportEnricherOptions = {}
  ) {
    this.provider = client.name;
    this.model = client.model;
    this.logger = options.logger ?? silentLogger;
  }

  async enrich(request: EnrichmentRequest): Promise<EnrichmentResult> {
    const messages = buildReportMessages(request);
    const outcome = await RetryManager.retryProviderOperation(
      () => this.client.complete({ messages, maxTokens: 1024, temperature: 0.2 }),
      this.options.retry
    );

    if (!outcome.success || outcome.result === undefined) {
      const error = outcome.error;
      if (error instanceof EnrichmentError) throw error;
      throw new EnrichmentError(
        `${this.provider} enrichment failed: ${describeCause(error)}`,
        this.provider,
        undefined,
        error
      );
    }

    const report = outcome.result.content.trim();
    if (!report) {
      throw new EnrichmentError(`${this.provider} returned an empty report`, this.provider, 200);
    }

    this.logger.debug(`📝 Report from ${this.provider}/${outcome.result.model} after ${outcome.attempts} attempt(s)`);
    return { report, modelUsed: `${this.provider}/${outcome.result.model}` };
  }
}
