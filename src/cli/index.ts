#!/usr/bin/env node
import { Command } from 'commander';
import { loadConfig, type ConfigOverrides, type HarnessConfig } from '../config/index.js';
import { ConfigError } from '../core/errors.js';
import type { TeardownReport } from '../core/types.js';
import { CredentialedSession, createCredential } from '../http/session.js';
import { metricsSummary } from '../metrics/index.js';
import { FixtureProvisioner } from '../services/fixtures.js';
import { ResourceLedger } from '../services/ledger.js';
import { waitUntilReady } from '../services/readiness.js';
import { wellKnownResources } from '../services/scenario.js';
import { TeardownExecutor } from '../services/teardown.js';
import { WorkflowOrchestrator, summarizeResult } from '../services/workflow.js';
import { getLogger, initLogger } from '../utils/logging.js';

// Exit codes: 0 ok, 1 failed scenario step (run) or failed deletion (cleanup),
// 2 server not ready, 3 bad configuration. Teardown failures after a passing
// run are reported but leave the exit code at 0.
const EXIT_FAILED = 1;
const EXIT_NOT_READY = 2;
const EXIT_CONFIG = 3;

interface CommonOpts {
  config?: string;
  baseUrl?: string;
  readyTimeout?: string;
  fixtureDir?: string;
}

const program = new Command();

program
  .name('mediahub-workflow')
  .description('End-to-end workflow check for the media storage API')
  .version('0.1.0');

function withCommonOptions(cmd: Command): Command {
  return cmd
    .option('-c, --config <path>', 'Path to JSON config file', 'workflow.config.json')
    .option('-u, --base-url <url>', 'API base URL (overrides config)')
    .option('-t, --ready-timeout <ms>', 'Readiness timeout in milliseconds')
    .option('-d, --fixture-dir <dir>', 'Directory for generated fixture files');
}

function resolveConfig(opts: CommonOpts): HarnessConfig {
  const overrides: ConfigOverrides = {};
  if (opts.baseUrl) overrides.api = { baseUrl: opts.baseUrl };
  if (opts.fixtureDir) overrides.fixtures = { dir: opts.fixtureDir };
  if (opts.readyTimeout !== undefined) {
    const ms = parseInt(opts.readyTimeout, 10);
    if (Number.isNaN(ms) || ms < 0) {
      throw new ConfigError('--ready-timeout must be a non-negative integer');
    }
    overrides.readiness = { timeoutMs: ms };
  }
  const cfg = loadConfig(opts.config, overrides);
  initLogger(cfg.logging);
  return cfg;
}

function printTeardown(report: TeardownReport) {
  for (const r of report.results) {
    const detail = r.detail ? ` (${r.detail})` : '';
    console.log(`  ${r.outcome.padEnd(7)} ${r.kind} ${r.key}${detail}`);
  }
}

withCommonOptions(program.command('run', { isDefault: true }))
  .description('Run the full workflow: pre-cleanup, scenario, teardown')
  .option('-m, --metrics', 'Print Prometheus metrics after the run', false)
  .action(async (opts: CommonOpts & { metrics?: boolean }) => {
    const cfg = resolveConfig(opts);
    const orchestrator = new WorkflowOrchestrator({ config: cfg });
    orchestrator.bus.on('stepPassed', ({ state, durationMs }) => {
      console.log(`[ok]   ${state} (${durationMs}ms)`);
    });
    orchestrator.bus.on('stepFailed', ({ state, message }) => {
      console.log(`[fail] ${state}: ${message}`);
    });
    const result = await orchestrator.run();
    console.log('--- Teardown ---');
    printTeardown(result.teardown);
    console.log(summarizeResult(result));
    if (opts.metrics) console.log(await metricsSummary());
    if (result.outcome === 'not-ready') process.exitCode = EXIT_NOT_READY;
    else if (result.outcome === 'failed') process.exitCode = EXIT_FAILED;
  });

withCommonOptions(program.command('cleanup'))
  .description('Delete all well-known resources and local fixtures, then exit')
  .action(async (opts: CommonOpts) => {
    const cfg = resolveConfig(opts);
    const admin = new CredentialedSession(
      createCredential(cfg.admin.username, cfg.admin.password),
      { baseUrl: cfg.api.baseUrl, timeoutMs: cfg.http.requestTimeoutMs },
    );
    const executor = new TeardownExecutor(admin, new FixtureProvisioner(cfg.fixtures.dir));
    const report = await executor.run(
      new ResourceLedger(),
      wellKnownResources(cfg.testUser.username),
    );
    printTeardown(report);
    console.log(
      report.failures ? `Cleanup finished with ${report.failures} failure(s)` : 'Cleanup OK',
    );
    if (report.failures) process.exitCode = EXIT_FAILED;
  });

withCommonOptions(program.command('wait'))
  .description('Wait until the API answers its liveness endpoint')
  .action(async (opts: CommonOpts) => {
    const cfg = resolveConfig(opts);
    const ready = await waitUntilReady(cfg.api.baseUrl, cfg.readiness);
    console.log(ready ? 'Server is ready' : `Server not ready after ${cfg.readiness.timeoutMs}ms`);
    if (!ready) process.exitCode = EXIT_NOT_READY;
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof ConfigError) {
    console.error(err.message);
    process.exit(EXIT_CONFIG);
  }
  getLogger().error({ err }, 'Unhandled CLI error');
  console.error(err);
  process.exit(EXIT_FAILED);
});
