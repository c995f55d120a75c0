import { err, ok, type Result } from 'neverthrow';

import { buildAdminIndex, type AdminUnitRecord } from '@/modules/admin-hierarchy/index.js';
import { createCodeList, type CodeList } from '@/modules/code-lists/index.js';
import { createOrganizationNormalizer } from '@/modules/organizations/index.js';

import { runPresence } from '../../core/usecases/run-presence.js';
import {
  DEFAULT_LEVELS,
  type PresenceRunDeps,
  type PresenceRunOptions,
  type PresenceRunResult,
  type RunConfig,
} from '../../core/types.js';

import type { PresenceConfigError } from '../../core/errors.js';
import type { SourceRow } from '@/common/types/rows.js';
import type { Logger } from '@/infra/logger/index.js';

export interface PresenceServiceDeps {
  logger: Logger;
}

export interface PresenceService {
  /**
   * Builds the immutable collaborators of a run from the reference hierarchy
   * and the run configuration.
   */
  prepare(
    units: readonly AdminUnitRecord[],
    config: RunConfig
  ): Result<PresenceRunDeps, PresenceConfigError>;

  /**
   * Runs the whole pipeline. Configuration errors abort before any row is read;
   * row level problems end up in the review lists of the result.
   */
  run(
    units: readonly AdminUnitRecord[],
    config: RunConfig,
    rows: readonly SourceRow[]
  ): Result<PresenceRunResult, PresenceConfigError>;
}

export const toRunOptions = (config: RunConfig): PresenceRunOptions => ({
  levels: config.levels ?? DEFAULT_LEVELS,
  countries: config.countries,
  gapSectors: config.gapSectors,
  datesInFileNames: config.datesInFileNames,
});

const logReview = (logger: Logger, result: PresenceRunResult): void => {
  for (const row of result.review.unresolvedRows) {
    logger.debug(
      {
        countryCode: row.source.countryCode,
        stage: row.stage,
        reason: row.reason,
        rawValue: row.rawValue,
        candidates: row.candidates,
        provenance: row.source.provenance,
      },
      'Row excluded from aggregation'
    );
  }

  for (const violation of result.review.violations) {
    logger.warn(
      {
        organizationId: violation.claim.organizationId,
        sectorCode: violation.claim.sectorCode,
        unitCode: violation.claim.unitCode,
        provenance: violation.claim.provenance,
      },
      violation.message
    );
  }

  for (const hint of result.review.invalidReferencePeriods) {
    logger.warn(
      { sourceFile: hint.sourceFile, reason: hint.reason },
      'Reference period in file name could not be read'
    );
  }

  if (result.review.unmatchedOrganizations.length > 0) {
    logger.info(
      { count: result.review.unmatchedOrganizations.length },
      'Organizations without a configured alias'
    );
  }

  if (result.review.unknownOrgTypes.length > 0) {
    logger.info({ count: result.review.unknownOrgTypes.length }, 'Unknown organization types');
  }
};

export const createPresenceService = (deps: PresenceServiceDeps): PresenceService => {
  const log = deps.logger.child({ component: 'PresenceService' });

  const prepare = (
    units: readonly AdminUnitRecord[],
    config: RunConfig
  ): Result<PresenceRunDeps, PresenceConfigError> => {
    const indexResult = buildAdminIndex(units);
    if (indexResult.isErr()) {
      return err(indexResult.error);
    }

    const organizations = createOrganizationNormalizer(config.organizations ?? {});
    if (organizations.isErr()) {
      return err(organizations.error);
    }

    const sectors = createCodeList('sector', config.sectors, {
      fuzzy: config.sectorMatching?.fuzzy,
    });
    if (sectors.isErr()) {
      return err(sectors.error);
    }

    let orgTypes: CodeList | undefined;
    if (config.orgTypes !== undefined) {
      const orgTypesResult = createCodeList('org type', config.orgTypes, {
        fuzzy: config.orgTypeMatching?.fuzzy,
      });
      if (orgTypesResult.isErr()) {
        return err(orgTypesResult.error);
      }
      orgTypes = orgTypesResult.value;
    }

    log.info(
      {
        units: indexResult.value.size,
        countries: indexResult.value.listCountries().length,
        sectors: sectors.value.codes().length,
      },
      'Reference data loaded'
    );

    return ok({
      index: indexResult.value,
      organizations: organizations.value,
      sectors: sectors.value,
      orgTypes,
      location: { fuzzy: config.location?.fuzzy },
    });
  };

  return {
    prepare,

    run(
      units: readonly AdminUnitRecord[],
      config: RunConfig,
      rows: readonly SourceRow[]
    ): Result<PresenceRunResult, PresenceConfigError> {
      const prepared = prepare(units, config);
      if (prepared.isErr()) {
        log.error({ error: prepared.error }, prepared.error.message);
        return err(prepared.error);
      }

      const result = runPresence(prepared.value, rows, toRunOptions(config));

      for (const stats of result.stats) {
        log.child({ countryCode: stats.countryCode }).info(
          {
            rowsIn: stats.rowsIn,
            hxlRowsSkipped: stats.hxlRowsSkipped,
            rowsResolved: stats.rowsResolved,
            rowsUnresolved: stats.rowsUnresolved,
            claims: stats.claims,
          },
          'Country rows processed'
        );
      }

      if (result.excludedRows > 0) {
        log.info({ excludedRows: result.excludedRows }, 'Rows of excluded countries skipped');
      }

      logReview(log, result);

      log.info(
        {
          records: result.records.length,
          coverageRows: result.coverage.length,
          presenceRows: result.presence.length,
          organizations: result.organizations.length,
        },
        'Presence run complete'
      );

      return ok(result);
    },
  };
};
