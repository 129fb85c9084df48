import { mkdir } from 'fs/promises';
import { createApp } from './app.js';
import { config } from './config.js';
import { createAppContext, settingsFromConfig } from './context.js';
import { startStoreSweepLoop, sweepOnStartup, type StoreSweepTargets } from './core/maintenance.js';
import { createAutomationProviders } from './providers/automation/index.js';
import { createDocumentConverter } from './providers/converter/index.js';

async function main() {
  for (const dir of [config.workDir, config.reportsDir, config.imagesDir, config.debugDir]) {
    await mkdir(dir, { recursive: true });
  }

  const automation = createAutomationProviders();
  const ctx = createAppContext({
    settings: settingsFromConfig(config),
    reports: automation.reports,
    cookies: automation.cookies,
    converter: createDocumentConverter(),
  });

  const sweepTargets: StoreSweepTargets = {
    workspaces: ctx.workspaces,
    debug: ctx.debug,
    reportsDir: config.reportsDir,
    imagesDir: config.imagesDir,
    artifactTtlSeconds: config.artifactTtlSeconds,
    imageTtlSeconds: config.imageTtlSeconds,
  };
  const swept = await sweepOnStartup(sweepTargets);
  console.log(
    `[portal-relay] startup sweep workspaces=${swept.workspaces} reports=${swept.reports} ` +
      `images=${swept.images} debug_sessions=${swept.debugSessions}`,
  );
  const sweeper = startStoreSweepLoop(sweepTargets, config.storeSweepIntervalMs);

  const app = createApp(ctx);
  const server = app.listen(config.port, () => {
    console.log(`[portal-relay] listening on ${config.publicBaseUrl}`);
    console.log(
      `[portal-relay] reports=${ctx.providers.reports} cookies=${ctx.providers.cookies} converter=${ctx.providers.converter}`,
    );
    console.log(`[portal-relay] data_dir=${config.dataDir} artifact_ttl=${config.artifactTtlSeconds}s`);
    console.log(`[portal-relay] api_key_gate=${config.masterApiKey ? 'enabled' : 'disabled'}`);
  });

  const shutdown = () => {
    sweeper.stop();
    ctx.scheduler.stop();
    server.close(() => {
      process.exit(0);
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  console.error('[portal-relay] fatal startup error', error);
  process.exit(1);
});
