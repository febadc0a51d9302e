import { LambdaClient } from '@aws-sdk/client-lambda';
import { serve } from '@hono/node-server';
import { createApp } from './app';
import { loadConfig } from './config';
import { LambdaAnalyzerInvoker } from './services/invoker.service';
import { OrchestratorService } from './services/orchestrator.service';
import { ReportService } from './services/report.service';
import { createStorageBackend } from './storage';

const config = loadConfig();

const storage = createStorageBackend(config);
const reports = new ReportService(storage);
const invoker = new LambdaAnalyzerInvoker(new LambdaClient({ region: config.awsRegion }), config.analyzerFunctions);

const orchestrator = new OrchestratorService({
  storage,
  invoker,
  reports,
  instanceContext: config.instance,
  runTimeoutMs: config.orchestration.runTimeoutMs,
  analyzerTimeoutMs: config.orchestration.analyzerTimeoutMs,
  finishedRunTtlMs: config.orchestration.finishedRunTtlMs,
  maxDaysBack: config.orchestration.maxDaysBack,
  publicBaseUrl: config.publicBaseUrl,
});

const app = createApp({
  orchestrator,
  storage,
  reports,
  defaultDaysBack: config.orchestration.defaultDaysBack,
});

serve({ fetch: app.fetch, port: config.port }, (info) => {
  console.log(`Server is running on http://localhost:${info.port}`);
});
