import fs from 'node:fs/promises';
import path from 'node:path';

import { createConfig, parseEnv } from '../src/infra/config/env.js';
import { createLogger } from '../src/infra/logger/index.js';
import { createAdminReferenceRepo } from '../src/modules/admin-hierarchy/index.js';
import {
  createPresenceInputRepo,
  createPresenceService,
} from '../src/modules/presence-run/index.js';

import type { FileLoadError } from '../src/common/types/errors.js';

const formatLoadError = (error: FileLoadError): string =>
  error.type === 'SchemaValidationError'
    ? `${error.message}\n  - ${error.details.join('\n  - ')}`
    : error.message;

const writeJson = async (dir: string, fileName: string, value: unknown): Promise<string> => {
  const filePath = path.join(dir, fileName);
  await fs.writeFile(filePath, `${JSON.stringify(value, null, 2)}\n`, 'utf8');
  return filePath;
};

const main = async (): Promise<void> => {
  const config = createConfig(parseEnv(process.env));
  const logger = createLogger({ level: config.logger.level, pretty: config.logger.pretty });

  const referenceRepo = createAdminReferenceRepo({ filePath: config.inputs.referencePath });
  const inputRepo = createPresenceInputRepo({
    configPath: config.inputs.runConfigPath,
    rowsPath: config.inputs.sourceRowsPath,
  });

  const [units, runConfig, rows] = await Promise.all([
    referenceRepo.loadUnits(),
    inputRepo.loadConfig(),
    inputRepo.loadRows(),
  ]);

  const loadErrors = [units, runConfig, rows].flatMap((result) =>
    result.isErr() ? [formatLoadError(result.error)] : []
  );
  if (units.isErr() || runConfig.isErr() || rows.isErr()) {
    for (const message of loadErrors) {
      logger.error(message);
    }
    process.exit(1);
  }

  const service = createPresenceService({ logger });
  const result = service.run(units.value, runConfig.value, rows.value);
  if (result.isErr()) {
    logger.error({ error: result.error }, `Invalid configuration: ${result.error.message}`);
    process.exit(1);
  }

  const outputDir = path.resolve(process.cwd(), config.outputs.dir);
  await fs.mkdir(outputDir, { recursive: true });

  const run = result.value;
  const written = await Promise.all([
    writeJson(outputDir, 'presence.json', run.presence),
    writeJson(outputDir, 'aggregates.json', run.records),
    writeJson(outputDir, 'coverage.json', run.coverage),
    writeJson(outputDir, 'organizations.json', run.organizations),
    writeJson(outputDir, 'review.json', { ...run.review, stats: run.stats, excludedRows: run.excludedRows }),
  ]);

  logger.info({ files: written }, 'Outputs written');
};

await main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
