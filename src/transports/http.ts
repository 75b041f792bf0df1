import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import express, { type NextFunction, type Request, type Response } from 'express';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { Services } from '../lib/services.js';
import { SERVER_NAME, SERVER_VERSION } from '../server/index.js';
import { ToolHandler } from '../server/handlers.js';
import type { CodeAnalyzer } from '../shared/analyzer.js';
import { PyLensError, ValidationError } from '../shared/errors.js';
import { silentLogger, type Logger } from '../shared/logger.js';
import type { AnalysisResult, HealthReport, HistoryEntry, Suggestion } from '../shared/types.js';
import { ValidationLayer } from '../shared/validation.js';

export const MCP_PROTOCOL_VERSION = '2025-06-18';

const JsonRpcRequestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.union([z.string(), z.number(), z.null()]).optional(),
  method: z.string().min(1),
  params: z.unknown().optional()
});

const ToolCallParamsSchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.unknown()).optional()
});

type JsonRpcId = string | number | null;

export interface HttpAppOptions {
  analyzer: CodeAnalyzer;
  logger?: Logger;
  /** Request body limit passed to `express.json`. */
  bodyLimit?: string;
}

// REST payloads use snake_case.
export function toHttpSuggestion(suggestion: Suggestion) {
  return {
    rule_id: suggestion.ruleId,
    message: suggestion.message,
    severity: suggestion.severity,
    line: suggestion.line,
    column: suggestion.column,
    metadata: suggestion.metadata
  };
}

export function toHttpAnalysis(result: AnalysisResult) {
  return {
    code_hash: result.fingerprint,
    suggestions: result.suggestions.map(toHttpSuggestion),
    analysis_time_ms: result.analysisTimeMs,
    cached: result.cached
  };
}

export function toHttpHealth(report: HealthReport) {
  return {
    status: report.status,
    cache: report.cache,
    rules_loaded: report.rulesLoaded,
    persistence: report.persistence,
    model_provider: report.modelProvider,
    service_level: report.serviceLevel
  };
}

function toHttpHistory(entry: HistoryEntry) {
  return {
    id: entry.id,
    code_hash: entry.fingerprint,
    code_snippet: entry.sourceText,
    suggestions: entry.suggestions.map(toHttpSuggestion),
    analysis_time_ms: entry.analysisTimeMs,
    language_version: entry.languageVersion,
    created_at: entry.timestamp.toISOString()
  };
}

type AsyncRoute = (req: Request, res: Response) => Promise<void>;

function route(handler: AsyncRoute) {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

export function createHttpApp(options: HttpAppOptions): express.Express {
  const { analyzer } = options;
  const logger = options.logger ?? silentLogger;
  const tools = new ToolHandler(analyzer, logger);
  const app = express();

  app.use(express.json({ limit: options.bodyLimit ?? '5mb' }));

  // Basic CORS
  app.use((req: Request, res: Response, next: NextFunction) => {
    res.header('Access-Control-Allow-Origin', '*');
    res.header('Access-Control-Allow-Headers', 'Content-Type, MCP-Protocol-Version');
    res.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    if (req.method === 'OPTIONS') {
      res.sendStatus(204);
    } else {
      next();
    }
  });

  app.post('/analyze-code', route(async (req, res) => {
    const body = ValidationLayer.validateHttpAnalyzeRequest(req.body);
    const result = await analyzer.analyze({ code: body.code, languageVersion: body.language_version });
    res.json(toHttpAnalysis(result));
  }));

  app.post('/analyze-code-llm', route(async (req, res) => {
    const body = ValidationLayer.validateHttpAnalyzeRequest(req.body);
    const result = await analyzer.analyzeWithReport({ code: body.code, languageVersion: body.language_version });
    res.json({
      code_hash: result.fingerprint,
      raw_suggestions: result.suggestions.map(toHttpSuggestion),
      prioritized_report: result.prioritizedReport,
      model_used: result.modelUsed,
      analysis_time_ms: result.analysisTimeMs,
      cached: result.cached,
      ...(result.enrichmentError ? { enrichment_error: result.enrichmentError } : {})
    });
  }));

  app.get('/health', route(async (_req, res) => {
    res.json(toHttpHealth(await analyzer.health()));
  }));

  app.get('/history/:codeHash', route(async (req, res) => {
    const codeHash = ValidationLayer.validateFingerprint(req.params.codeHash);
    if (!analyzer.historyEnabled) {
      res.status(404).json({ error: 'not_found', message: 'Analysis history is disabled' });
      return;
    }
    const entry = await analyzer.findHistory(codeHash);
    if (!entry) {
      res.status(404).json({ error: 'not_found', message: `No analysis recorded for ${codeHash}` });
      return;
    }
    res.json(toHttpHistory(entry));
  }));

  // MCP over plain JSON-RPC
  app.post('/', route(async (req, res) => {
    const rawId = extractId(req.body);
    const parsed = JsonRpcRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json(rpcError(rawId, -32600, 'Invalid Request'));
      return;
    }

    const message = parsed.data;
    const id = message.id ?? null;
    logger.debug(`📨 Received MCP request: ${message.method}`);

    switch (message.method) {
      case 'initialize':
        res.json({
          jsonrpc: '2.0',
          id,
          result: {
            protocolVersion: MCP_PROTOCOL_VERSION,
            capabilities: { tools: {} },
            serverInfo: { name: SERVER_NAME, version: SERVER_VERSION }
          }
        });
        return;

      case 'tools/list':
        res.json({ jsonrpc: '2.0', id, result: { tools: tools.listTools() } });
        return;

      case 'tools/call': {
        const params = ToolCallParamsSchema.safeParse(message.params);
        if (!params.success) {
          res.status(400).json(rpcError(id, ErrorCode.InvalidParams, 'Invalid tool call parameters'));
          return;
        }
        try {
          const result = await tools.call(params.data.name, params.data.arguments ?? {});
          res.json({ jsonrpc: '2.0', id, result });
        } catch (error) {
          if (!(error instanceof McpError)) throw error;
          res.status(rpcStatus(error.code)).json(rpcError(id, error.code, error.message, error.data));
        }
        return;
      }

      default:
        res.status(404).json(rpcError(id, ErrorCode.MethodNotFound, `Method not found: ${message.method}`));
    }
  }));

  app.get('/', (_req: Request, res: Response) => {
    res.json({
      service: 'pylens',
      version: SERVER_VERSION,
      endpoints: {
        analyze: 'POST /analyze-code',
        report: 'POST /analyze-code-llm',
        health: 'GET /health',
        history: 'GET /history/:codeHash',
        mcp: 'POST /'
      }
    });
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    sendError(res, error, logger);
  });

  return app;
}

function sendError(res: Response, error: unknown, logger: Logger): void {
  if (isBodyParserError(error)) {
    const status = error.type === 'entity.too.large' ? 413 : 400;
    res.status(status).json({ error: 'invalid_body', message: error.message });
    return;
  }

  if (error instanceof ValidationError) {
    res.status(400).json({
      error: 'validation_error',
      message: ValidationLayer.formatIssues(error.issues),
      issues: error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }))
    });
    return;
  }

  if (error instanceof PyLensError) {
    logger.error(`❌ Request failed [${error.correlationId}]: ${error.message}`);
    res.status(500).json({
      error: error.category,
      message: error.getUserFriendlyMessage(),
      correlation_id: error.correlationId
    });
    return;
  }

  logger.error(`❌ Unexpected request failure: ${error instanceof Error ? error.message : String(error)}`);
  res.status(500).json({ error: 'internal_error', message: 'Internal server error' });
}

function isBodyParserError(error: unknown): error is Error & { type: string } {
  return error instanceof Error && 'type' in error && typeof error.type === 'string' && error.type.startsWith('entity.');
}

function rpcError(id: JsonRpcId, code: number, message: string, data?: unknown) {
  return {
    jsonrpc: '2.0',
    id,
    error: data === undefined ? { code, message } : { code, message, data }
  };
}

function rpcStatus(code: number): number {
  if (code === ErrorCode.InvalidParams) return 400;
  if (code === ErrorCode.MethodNotFound) return 404;
  return 500;
}

function extractId(body: unknown): JsonRpcId {
  if (typeof body === 'object' && body !== null && 'id' in body) {
    const id = body.id;
    if (typeof id === 'string' || typeof id === 'number') return id;
  }
  return null;
}

/** Starts listening; resolves once the port is bound. */
export async function startHttpServer(services: Services, port: number): Promise<Server> {
  const app = createHttpApp({ analyzer: services.analyzer, logger: services.logger });

  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      const address = server.address();
      const bound = isAddressInfo(address) ? address.port : port;
      services.logger.info(`🚀 pylens HTTP server listening on port ${bound}`);
      services.logger.info(`🏥 Health check: http://localhost:${bound}/health`);
      resolve(server);
    });
    server.on('error', (error: Error) => {
      services.logger.error(`❌ HTTP server error: ${error.message}`);
      reject(error);
    });
  });
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return typeof address === 'object' && address !== null;
}
