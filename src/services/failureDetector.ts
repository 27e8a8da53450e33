import type { Logger } from 'pino';
import type { QueryError } from '../core/errors.js';
import { fail, ok, type Result } from '../core/result.js';
import type { BrokenBuildRef, DetectionReport, ResponsibilityVerdict } from '../core/types.js';
import type { BuildServerQuery } from '../teamcity/client.js';
import { readBuildCollection } from '../teamcity/document.js';
import { getLogger } from '../utils/logging.js';
import { ResponsibilityResolver } from './responsibilityResolver.js';

export const FAILED_BUILDS_PATH = '/httpAuth/app/rest/builds/';
// Every build since the latest success: one entry per broken configuration
export const SINCE_LAST_SUCCESS_QUERY = 'locator=sinceBuild:(status:success)';

export interface UnacknowledgedFailureSource {
  detectUnacknowledgedFailures(): Promise<Result<BrokenBuildRef[], QueryError>>;
}

export class FailureDetector implements UnacknowledgedFailureSource {
  private readonly logger: Logger;
  private readonly resolver: ResponsibilityResolver;

  constructor(
    private readonly client: BuildServerQuery,
    opts?: { resolver?: ResponsibilityResolver; logger?: Logger },
  ) {
    this.logger = opts?.logger ?? getLogger();
    this.resolver = opts?.resolver ?? new ResponsibilityResolver(client, this.logger);
  }

  async detect(): Promise<Result<DetectionReport, QueryError>> {
    const collection = await this.client.query(FAILED_BUILDS_PATH, SINCE_LAST_SUCCESS_QUERY);
    if (!collection.ok) return fail(collection.error);

    const { refs, skipped } = readBuildCollection(collection.value);
    if (skipped > 0) {
      this.logger.warn({ skipped }, 'Ignoring failed-build entries without an href');
    }
    const brokenBuilds = [...new Map(refs.map((r) => [r.href, r] as const)).values()];

    // Sequential, in collection order
    const verdicts: ResponsibilityVerdict[] = [];
    for (const ref of brokenBuilds) {
      const verdict = await this.resolver.resolve(ref);
      if (!verdict.ok) return fail(verdict.error);
      verdicts.push(verdict.value);
    }
    const unacknowledged = verdicts.filter((v) => !v.taken).map((v) => v.buildRef);
    return ok({ brokenBuilds, verdicts, unacknowledged });
  }

  async detectUnacknowledgedFailures(): Promise<Result<BrokenBuildRef[], QueryError>> {
    const report = await this.detect();
    return report.ok ? ok(report.value.unacknowledged) : report;
  }
}
