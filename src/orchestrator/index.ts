import type { Logger } from 'pino';
import type { ZeroTrustConfig } from '../config/index.js';
import type { AuditLogger } from '../audit/index.js';
import type { ValidationPath } from '../audit/types.js';
import type {
  InvalidResult,
  TokenValidator,
  ValidationMode,
  ValidationRequest,
  ValidationResult,
} from '../validation/types.js';

type PathOutcome =
  | { status: 'done'; result: ValidationResult }
  | { status: 'timeout'; timeoutMs: number }
  | { status: 'error'; err: unknown };

export interface OrchestratorStats {
  servedPath: ValidationPath;
  parallel: boolean;
  requests: number;
  comparisons: number;
  discrepancies: number;
  timeouts: Record<ValidationPath, number>;
  errors: number;
}

function outcomeLabel(result: ValidationResult): string {
  return result.valid ? 'valid' : result.failure;
}

/**
 * Runs the legacy and enhanced decision paths side by side. Only the served path's
 * result is returned; the other one runs in shadow mode, is compared in the
 * background and any disagreement is counted and audited. The served path must answer within the
 * middleware budget, otherwise the request fails closed with ValidationTimeout.
 */
export class ValidationOrchestrator {
  private readonly pending = new Set<Promise<void>>();
  private counters = {
    requests: 0,
    comparisons: 0,
    discrepancies: 0,
    timeouts: { legacy: 0, enhanced: 0 },
    errors: 0,
  };

  constructor(
    private readonly legacy: TokenValidator,
    private readonly enhanced: TokenValidator,
    private readonly audit: AuditLogger,
    private readonly config: ZeroTrustConfig,
    private readonly logger: Logger
  ) {}

  get servedPath(): ValidationPath {
    return this.config.fail_safe_mode ? 'legacy' : 'enhanced';
  }

  async validate(request: ValidationRequest): Promise<ValidationResult> {
    this.counters.requests++;
    const served = this.servedPath === 'legacy' ? this.legacy : this.enhanced;
    const shadow = this.servedPath === 'legacy' ? this.enhanced : this.legacy;

    const servedRun = this.run(served, request, this.config.middleware_budget_ms, 'served');

    if (this.config.parallel_validation.enabled) {
      const shadowRun = this.run(shadow, request, this.config.timeout_ms, 'shadow');
      this.track(this.compare(request, servedRun, shadowRun));
    } else {
      this.track(servedRun.then((outcome) => this.account(served.path, outcome, request)));
    }

    return this.resolve(served.path, await servedRun);
  }

  /** Wait for every background comparison started so far */
  async settled(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  stats(): OrchestratorStats {
    return {
      servedPath: this.servedPath,
      parallel: this.config.parallel_validation.enabled,
      requests: this.counters.requests,
      comparisons: this.counters.comparisons,
      discrepancies: this.counters.discrepancies,
      timeouts: { ...this.counters.timeouts },
      errors: this.counters.errors,
    };
  }

  private run(
    validator: TokenValidator,
    request: ValidationRequest,
    timeoutMs: number,
    mode: ValidationMode
  ): Promise<PathOutcome> {
    const controller = new AbortController();
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        controller.abort();
        resolve({ status: 'timeout', timeoutMs });
      }, timeoutMs);

      validator.validate(request, controller.signal, mode).then(
        (result) => {
          clearTimeout(timer);
          resolve({ status: 'done', result });
        },
        (err: unknown) => {
          clearTimeout(timer);
          resolve({ status: 'error', err });
        }
      );
    });
  }

  private resolve(path: ValidationPath, outcome: PathOutcome): ValidationResult {
    if (outcome.status === 'done') {
      return outcome.result;
    }
    const result: InvalidResult = {
      valid: false,
      path,
      failure: outcome.status === 'timeout' ? 'ValidationTimeout' : 'StoreUnavailable',
      riskScore: 0,
      cacheHit: false,
      durationMs: outcome.status === 'timeout' ? outcome.timeoutMs : 0,
    };
    return result;
  }

  private async compare(
    request: ValidationRequest,
    servedRun: Promise<PathOutcome>,
    shadowRun: Promise<PathOutcome>
  ): Promise<void> {
    const [served, shadow] = await Promise.all([servedRun, shadowRun]);
    const servedPath = this.servedPath;
    const shadowPath: ValidationPath = servedPath === 'legacy' ? 'enhanced' : 'legacy';

    await this.account(servedPath, served, request);
    await this.account(shadowPath, shadow, request);

    if (served.status !== 'done' || shadow.status !== 'done') {
      return;
    }

    this.counters.comparisons++;
    const legacy = servedPath === 'legacy' ? served.result : shadow.result;
    const enhanced = servedPath === 'legacy' ? shadow.result : served.result;
    if (legacy.valid === enhanced.valid) {
      return;
    }

    this.counters.discrepancies++;
    const tenant = legacy.valid ? legacy.tenant : enhanced.valid ? enhanced.tenant : undefined;
    this.logger.warn(
      {
        legacy: outcomeLabel(legacy),
        enhanced: outcomeLabel(enhanced),
        servedPath,
        tokenId: legacy.tokenId ?? enhanced.tokenId,
      },
      'Validation paths disagree'
    );
    await this.audit.record({
      kind: 'discrepancy',
      severity: 'critical',
      tokenId: legacy.tokenId ?? enhanced.tokenId,
      tenantId: tenant?.tenantId,
      endpoint: request.endpoint,
      outcome: 'discrepancy',
      detail: {
        legacy: outcomeLabel(legacy),
        enhanced: outcomeLabel(enhanced),
        served: servedPath,
      },
    });
  }

  private async account(
    path: ValidationPath,
    outcome: PathOutcome,
    request: ValidationRequest
  ): Promise<void> {
    if (outcome.status === 'timeout') {
      this.counters.timeouts[path]++;
      this.logger.warn({ path, timeoutMs: outcome.timeoutMs }, 'Validation path timed out');
      await this.audit.record({
        kind: 'timeout',
        severity: 'elevated',
        path,
        endpoint: request.endpoint,
        outcome: 'ValidationTimeout',
        detail: { timeoutMs: outcome.timeoutMs },
      });
    } else if (outcome.status === 'error') {
      this.counters.errors++;
      this.logger.error({ err: outcome.err, path }, 'Validation path failed');
    }
  }

  private track(work: Promise<void>): void {
    const tracked: Promise<void> = work
      .catch((err: unknown) => {
        this.counters.errors++;
        this.logger.error({ err }, 'Validation comparison failed');
      })
      .finally(() => {
        this.pending.delete(tracked);
      });
    this.pending.add(tracked);
  }
}
