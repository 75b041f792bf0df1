import { PyLensError, ErrorCategory } from './errors.js';
import { silentLogger, type Logger } from './logger.js';

export enum ServiceLevel {
  FULL = 'full',           // All features available
  DEGRADED = 'degraded',   // One component down
  MINIMAL = 'minimal'      // Static analysis only
}

export type Component = 'cache' | 'enrichment' | 'persistence';

export interface ServiceStatus {
  level: ServiceLevel;
  availableFeatures: string[];
  unavailableFeatures: string[];
  degradationReason?: string;
}

export interface DegradationStrategy {
  name: string;
  component: Component;
  condition: (error: PyLensError) => boolean;
  description: string;
}

export interface DegradationEvent {
  timestamp: Date;
  component: Component;
  change: 'failed' | 'recovered';
  level: ServiceLevel;
  reason: string;
}

const CORE_FEATURES = ['Static analysis', 'Syntax error reporting', 'In-process analysis cache'];

const COMPONENT_FEATURES: Record<Component, string> = {
  cache: 'Shared analysis cache (Redis)',
  enrichment: 'Prioritized model reports',
  persistence: 'Analysis history'
};

const HISTORY_LIMIT = 50;

/**
 * Tracks which optional components are currently failing and derives the
 * service level from them. Static analysis itself never degrades.
 */
export class GracefulDegradationManager {
  private readonly failures = new Map<Component, string>();
  private degradationHistory: DegradationEvent[] = [];

  private readonly strategies: DegradationStrategy[] = [
    {
      name: 'fallback-cache',
      component: 'cache',
      condition: (error) => error.category === ErrorCategory.CACHE,
      description: 'Serve from the in-process cache while the shared cache is unreachable'
    },
    {
      name: 'raw-suggestions-only',
      component: 'enrichment',
      condition: (error) =>
        error.category === ErrorCategory.EXTERNAL_SERVICE || error.category === ErrorCategory.RATE_LIMIT,
      description: 'Return raw suggestions when the model provider fails'
    },
    {
      name: 'skip-history',
      component: 'persistence',
      condition: (error) => error.category === ErrorCategory.PERSISTENCE,
      description: 'Keep analysing without recording history'
    }
  ];

  constructor(private readonly logger: Logger = silentLogger) {}

  /** Marks the component an error belongs to as failing, if any strategy applies. */
  public handleError(error: PyLensError): ServiceStatus {
    const strategy = this.strategies.find(s => s.condition(error));
    if (strategy) {
      this.recordFailure(strategy.component, `${strategy.name}: ${error.message}`);
    }
    return this.getCurrentStatus();
  }

  public recordFailure(component: Component, reason: string): void {
    const wasDown = this.failures.has(component);
    this.failures.set(component, reason);
    if (!wasDown) {
      this.logger.warn(`⚠️ ${component} unavailable, service level ${this.getLevel()}`, { reason });
      this.recordEvent(component, 'failed', reason);
    }
  }

  public recordRecovery(component: Component): void {
    if (!this.failures.delete(component)) return;
    this.logger.info(`✅ ${component} recovered, service level ${this.getLevel()}`);
    this.recordEvent(component, 'recovered', 'component recovered');
  }

  public isDegraded(component: Component): boolean {
    return this.failures.has(component);
  }

  public getLevel(): ServiceLevel {
    if (this.failures.size === 0) return ServiceLevel.FULL;
    if (this.failures.size === 1) return ServiceLevel.DEGRADED;
    return ServiceLevel.MINIMAL;
  }

  public getCurrentStatus(): ServiceStatus {
    const components = Object.keys(COMPONENT_FEATURES).filter(isComponent);
    const available = components.filter(c => !this.failures.has(c)).map(c => COMPONENT_FEATURES[c]);
    const unavailable = components.filter(c => this.failures.has(c)).map(c => COMPONENT_FEATURES[c]);
    const reasons = [...this.failures.values()];

    return {
      level: this.getLevel(),
      availableFeatures: [...CORE_FEATURES, ...available],
      unavailableFeatures: unavailable,
      degradationReason: reasons.length > 0 ? reasons.join('; ') : undefined
    };
  }

  public getStrategies(): DegradationStrategy[] {
    return [...this.strategies];
  }

  public getDegradationHistory(): DegradationEvent[] {
    return [...this.degradationHistory];
  }

  private recordEvent(component: Component, change: DegradationEvent['change'], reason: string): void {
    this.degradationHistory.push({
      timestamp: new Date(),
      component,
      change,
      level: this.getLevel(),
      reason
    });

    if (this.degradationHistory.length > HISTORY_LIMIT) {
      this.degradationHistory = this.degradationHistory.slice(-HISTORY_LIMIT);
    }
  }
}

function isComponent(value: string): value is Component {
  return value === 'cache' || value === 'enrichment' || value === 'persistence';
}
