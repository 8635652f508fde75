import { loadEnvConfig } from '../worker/config';
import { openSqliteStore } from '../worker/db';
import { RemoteCompanyProvider, StaticCompanyProvider } from '../worker/providers/companyProvider';
import type { CompanyProvider } from '../worker/providers/companyProvider';
import { NameProvider } from '../worker/providers/nameProvider';
import { ProjectNameProvider } from '../worker/providers/projectNameProvider';
import { createGenerationContext } from '../worker/services/context';
import { runGeneration } from '../worker/services/generationService';
import type { GenerationSummary } from '../worker/services/generationService';
import { createLogger, recordLog } from '../worker/services/logService';
import { TextService } from '../worker/services/textService';

const formatSummary = (summary: GenerationSummary) => {
  const width = Math.max(...Object.keys(summary.counts).map((name) => name.length));
  return [
    'Generation statistics:',
    ...Object.entries(summary.counts).map(([name, count]) => `  ${name.padEnd(width)}  ${count}`),
    `  LLM calls: ${summary.llm.callCount}, tokens: ${summary.llm.totalTokens}`,
    `  Finished in ${(summary.durationMs / 1000).toFixed(1)}s`,
  ].join('\n');
};

const main = async () => {
  const config = loadEnvConfig(process.env);
  const logger = createLogger('generate', config.logLevel);
  const ctx = createGenerationContext(config);
  const store = openSqliteStore(config.dbPath);
  logger.info(`Writing to ${config.dbPath}`);

  try {
    const fallback = new StaticCompanyProvider(ctx.rng);
    const companies: CompanyProvider = config.companySourceUrl
      ? new RemoteCompanyProvider({
          url: config.companySourceUrl,
          rng: ctx.rng,
          fallback,
          logger: createLogger('companies', config.logLevel),
        })
      : fallback;
    const text = new TextService(config.llm, createLogger('llm', config.logLevel), (kind, payload) =>
      recordLog(store, kind, payload)
    );

    const { summary } = await runGeneration(ctx, {
      store,
      companies,
      names: new NameProvider(ctx.rng),
      projectNames: new ProjectNameProvider(ctx.rng),
      text,
      logger,
    });
    console.log(formatSummary(summary));
  } finally {
    await store.close();
  }
};

main().catch((error: unknown) => {
  console.error('[generate] Generation failed:', error);
  process.exit(1);
});
