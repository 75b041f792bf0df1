import { randomUUID } from 'node:crypto';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { CodeAnalyzer } from '../shared/analyzer.js';
import { ErrorCategory, PyLensError, ValidationError } from '../shared/errors.js';
import { silentLogger, type Logger } from '../shared/logger.js';
import { ValidationLayer } from '../shared/validation.js';
import {
  formatAnalysisMarkdown,
  formatHealthMarkdown,
  formatReportMarkdown,
  formatRulesMarkdown
} from './format.js';
import { TOOL_NAMES, tools } from './tools.js';

export type TextContent = {
  type: 'text';
  text: string;
};

export type ToolResult = {
  content: TextContent[];
};

const HealthArgsSchema = z.object({ detailed: z.boolean().default(false) }).strict();

function text(value: string): ToolResult {
  return { content: [{ type: 'text', text: value }] };
}

/**
 * Executes MCP tool calls against the analyzer. Shared by the stdio server
 * and the HTTP JSON-RPC route.
 */
export class ToolHandler {
  constructor(
    private readonly analyzer: CodeAnalyzer,
    private readonly logger: Logger = silentLogger
  ) {}

  listTools() {
    return tools;
  }

  async call(name: string, args: unknown): Promise<ToolResult> {
    const correlationId = `tool_${randomUUID()}`;
    this.logger.debug(`🔧 Tool called: ${name} [${correlationId}]`);

    try {
      return await this.dispatch(name, args ?? {});
    } catch (error) {
      if (error instanceof McpError) throw error;
      throw toMcpError(error, name, correlationId, this.logger);
    }
  }

  private async dispatch(name: string, args: unknown): Promise<ToolResult> {
    switch (name) {
      case TOOL_NAMES.analyze: {
        const input = ValidationLayer.validateAnalyzeToolArgs(args);
        const result = await this.analyzer.analyze(
          { code: input.code, languageVersion: input.languageVersion },
          { useCache: input.useCache }
        );
        return text(formatAnalysisMarkdown(result));
      }

      case TOOL_NAMES.report: {
        const input = ValidationLayer.validateAnalyzeToolArgs(args);
        const result = await this.analyzer.analyzeWithReport(
          { code: input.code, languageVersion: input.languageVersion },
          { useCache: input.useCache }
        );
        return text(formatReportMarkdown(result));
      }

      case TOOL_NAMES.listRules:
        return text(formatRulesMarkdown(this.analyzer.listRules()));

      case TOOL_NAMES.health: {
        const parsed = HealthArgsSchema.safeParse(args);
        if (!parsed.success) {
          throw new ValidationError('Invalid health-check arguments', parsed.error.issues);
        }
        const report = await this.analyzer.health();
        return text(formatHealthMarkdown(report, parsed.data.detailed));
      }

      default:
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`, {
          availableTools: tools.map(tool => tool.name)
        });
    }
  }
}

export function toMcpError(error: unknown, toolName: string, correlationId: string, logger: Logger): McpError {
  if (error instanceof ValidationError) {
    logger.warn(`⚠️ Tool '${toolName}' rejected its arguments [${correlationId}]`);
    const formatted = ValidationLayer.formatMCPError(error);
    return new McpError(ErrorCode.InvalidParams, formatted.message, {
      ...formatted.data,
      correlationId,
      recoveryActions: error.getRecoveryActions()
    });
  }

  logger.error(`❌ Tool '${toolName}' failed [${correlationId}]: ${error instanceof Error ? error.message : String(error)}`);

  if (error instanceof PyLensError) {
    const code = error.category === ErrorCategory.VALIDATION ? ErrorCode.InvalidParams : ErrorCode.InternalError;
    return new McpError(code, error.getUserFriendlyMessage(), {
      category: error.category,
      severity: error.severity,
      recoverable: error.recoverable,
      correlationId,
      recoveryActions: error.getRecoveryActions()
    });
  }

  return new McpError(
    ErrorCode.InternalError,
    'An unexpected error occurred. Please try again or report the issue if it persists.',
    {
      correlationId,
      errorType: error instanceof Error ? error.constructor.name : typeof error
    }
  );
}
