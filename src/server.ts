import { buildApp } from './app.js';
import { loadConfig, toGatePolicy } from './config.js';
import { AuditLog } from './crypto/index.js';
import { InferenceRouter } from './inference/router.js';
import { createLogger } from './logger.js';
import {
  SqliteAttemptStore,
  SqliteMemoryStore,
  SqliteReferenceDataset,
  closeDatabase,
  initializeDatabase,
  loadReferenceFile
} from './repository/index.js';
import { ClassificationService } from './services/classification-service.js';
import { ToolRegistry, checkMemoryTool, searchCodesTool, verifyCodeTool } from './tools/index.js';

async function main() {
  const config = loadConfig();

  const logger = createLogger({
    level: process.env.LOG_LEVEL || config.log.level,
    pretty: config.log.pretty
  });

  logger.info('Tariff gate starting...');

  if (config.auth.api_keys.length === 0) {
    logger.warn('No API keys configured; every classify request will be rejected');
  }

  // Initialize components
  const db = initializeDatabase(config.storage.database);
  const dataset = new SqliteReferenceDataset(db);
  if (config.storage.reference_data) {
    const records = loadReferenceFile(config.storage.reference_data);
    dataset.upsert(records);
    logger.info({ records: records.length }, 'Reference data loaded');
  }

  const memory = new SqliteMemoryStore(db);
  const attempts = new SqliteAttemptStore(db);

  const registry = new ToolRegistry()
    .register(checkMemoryTool(memory))
    .register(verifyCodeTool(dataset))
    .register(searchCodesTool(dataset));

  const router = InferenceRouter.fromConfig(config.inference.primary, config.inference.secondary);
  const auditLog = new AuditLog(config.audit.log_path);

  const service = new ClassificationService({
    registry,
    providers: router.providers(),
    dataset,
    attempts,
    memory,
    policy: toGatePolicy(config),
    limits: {
      maxRounds: config.orchestrator.max_rounds,
      maxToolsPerRound: config.orchestrator.max_tools_per_round,
      timeBudgetMs: config.orchestrator.time_budget_ms,
      callTimeoutMs: config.orchestrator.call_timeout_ms
    },
    logger,
    audit: auditLog
  });

  const app = await buildApp({
    config,
    service,
    backends: router.getAvailableBackends(),
    tools: registry.getToolNames(),
    auditLog,
    logger
  });

  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    await app.close();
    closeDatabase(db);
    process.exit(0);
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch(err => {
        logger.error(err);
        process.exit(1);
      });
    });
  }

  // Start server
  try {
    await app.listen({ port: config.server.port, host: config.server.host });
    logger.info(`Tariff gate listening on ${config.server.host}:${config.server.port}`);
  } catch (err) {
    logger.error(err);
    closeDatabase(db);
    process.exit(1);
  }
}

main().catch(error => {
  console.error(error);
  process.exit(1);
});
