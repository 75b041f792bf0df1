import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { MAX_SOURCE_LENGTH } from '../shared/schemas.js';

export const TOOL_NAMES = {
  analyze: 'analyze-python',
  report: 'analyze-python-report',
  listRules: 'list-rules',
  health: 'health-check'
} as const;

export type ToolName = (typeof TOOL_NAMES)[keyof typeof TOOL_NAMES];

const analyzeInputSchema: Tool['inputSchema'] = {
  type: 'object',
  properties: {
    code: {
      type: 'string',
      description: 'Python source to analyze (required, max 1MB)',
      minLength: 1,
      maxLength: MAX_SOURCE_LENGTH
    },
    languageVersion: {
      type: 'string',
      description: 'Target Python version, e.g. "3.11" (optional, part of the cache key)',
      maxLength: 32
    },
    useCache: {
      type: 'boolean',
      description: 'Serve and store results through the analysis cache',
      default: true
    }
  },
  required: ['code'],
  additionalProperties: false
};

export const tools: Tool[] = [
  {
    name: TOOL_NAMES.analyze,
    description: 'Runs static analysis on a Python snippet and returns suggestions ordered by rule',
    inputSchema: analyzeInputSchema
  },
  {
    name: TOOL_NAMES.report,
    description: 'Analyzes a Python snippet and asks the configured model for a prioritized improvement report',
    inputSchema: analyzeInputSchema
  },
  {
    name: TOOL_NAMES.listRules,
    description: 'Lists the active analysis rules in evaluation order',
    inputSchema: {
      type: 'object',
      properties: {},
      additionalProperties: false
    }
  },
  {
    name: TOOL_NAMES.health,
    description: 'Reports cache, persistence and model provider status',
    inputSchema: {
      type: 'object',
      properties: {
        detailed: {
          type: 'boolean',
          description: 'Include runtime metrics',
          default: false
        }
      },
      additionalProperties: false
    }
  }
];
