import type { Logger } from 'pino';
import type { QueryError } from '../core/errors.js';
import { fail, ok, type Result } from '../core/result.js';
import type { BrokenBuildRef, BuildDetail, ResponsibilityVerdict } from '../core/types.js';
import type { BuildServerQuery } from '../teamcity/client.js';
import {
  readBuildDetail,
  readBuildTypeDetail,
  readInvestigation,
  type XmlElement,
} from '../teamcity/document.js';
import { getLogger } from '../utils/logging.js';

/** Investigation states that mean someone owns the failure. Case-sensitive, TeamCity's own tokens. */
export const CLOSED_INVESTIGATION_STATES: ReadonlySet<string> = new Set(['TAKEN', 'FIXED']);

export function isClosedInvestigationState(state: string | undefined): boolean {
  return state !== undefined && CLOSED_INVESTIGATION_STATES.has(state);
}

export function auditMessage(verdict: ResponsibilityVerdict): string {
  let line = `Broken build: ${verdict.buildTypeName ?? verdict.buildRef.href}`;
  if (verdict.triggeredBy) line += ` (broken by ${verdict.triggeredBy})`;
  if (verdict.taken) line += `, responsibility taken by ${verdict.assignee ?? 'unknown'}`;
  return line;
}

/**
 * Stitches build → build type → investigations into a single verdict.
 * Only the build resource is mandatory; every later hop that is missing
 * or fails resolves to "not taken" so the siren errs towards sounding.
 */
export class ResponsibilityResolver {
  private readonly logger: Logger;

  constructor(
    private readonly client: BuildServerQuery,
    logger?: Logger,
  ) {
    this.logger = logger ?? getLogger();
  }

  async resolve(buildRef: BrokenBuildRef): Promise<Result<ResponsibilityVerdict, QueryError>> {
    const build = await this.client.query(buildRef.href);
    if (!build.ok) return fail(build.error);

    const detail = readBuildDetail(build.value);
    const verdict = await this.followInvestigation(buildRef, detail);
    this.logger.info(
      { build: buildRef.href, taken: verdict.taken, state: verdict.investigationState },
      auditMessage(verdict),
    );
    return ok(verdict);
  }

  async isResponsibilityTaken(buildRef: BrokenBuildRef): Promise<Result<boolean, QueryError>> {
    const verdict = await this.resolve(buildRef);
    return verdict.ok ? ok(verdict.value.taken) : verdict;
  }

  private async followInvestigation(
    buildRef: BrokenBuildRef,
    detail: BuildDetail,
  ): Promise<ResponsibilityVerdict> {
    const notTaken: ResponsibilityVerdict = {
      buildRef,
      buildTypeName: detail.buildType?.name,
      triggeredBy: detail.triggeredBy,
      taken: false,
    };

    const buildTypeHref = detail.buildType?.href;
    if (!buildTypeHref) return notTaken;
    const buildType = await this.optional(buildTypeHref, buildRef);
    if (!buildType) return notTaken;

    const { investigationsHref } = readBuildTypeDetail(buildType);
    if (!investigationsHref) return notTaken;
    const investigations = await this.optional(investigationsHref, buildRef);
    if (!investigations) return notTaken;

    const record = readInvestigation(investigations);
    if (!record) return notTaken;
    const taken = isClosedInvestigationState(record.state);
    return {
      ...notTaken,
      investigationState: record.state,
      assignee: taken ? record.assignee : undefined,
      taken,
    };
  }

  private async optional(href: string, buildRef: BrokenBuildRef): Promise<XmlElement | undefined> {
    const res = await this.client.query(href);
    if (res.ok) return res.value;
    this.logger.warn(
      { build: buildRef.href, href, err: res.error },
      'Optional resource unavailable, treating responsibility as not taken',
    );
    return undefined;
  }
}
