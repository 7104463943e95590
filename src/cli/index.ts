#!/usr/bin/env node
import { existsSync, realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { toPublicRun } from '../api/schemas/monitorSchemas.js';
import { serve } from '../api/serve.js';
import { createMonitorContext, type MonitorContext } from '../services/context.js';
import { getLogger } from '../utils/logging.js';

export function buildProgram(makeContext: () => Promise<MonitorContext> = defaultContext): Command {
  const program = new Command();
  program
    .name('shipment-monitor')
    .description('Shipment exception monitor and notification dispatcher')
    .version('0.1.0');

  program
    .command('serve')
    .description('Start the HTTP API and the monitor scheduler')
    .action(async () => {
      await serve();
    });

  program
    .command('run-once')
    .description('Run a single monitor cycle and print its summary')
    .action(async () => {
      await withContext(makeContext, async (ctx) => {
        const result = await ctx.monitor.runOnce();
        console.log(
          JSON.stringify(
            {
              runId: result.runId,
              ...result.record,
              runTimestamp: result.record.runTimestamp.toISOString(),
              deadlineExceeded: result.deadlineExceeded,
              ruleErrors: result.ruleErrors,
              findings: result.findings.map((f) => ({
                shipmentId: f.shipmentId,
                type: f.type,
                severity: f.severity,
                summary: f.summary,
              })),
              outcomes: result.outcomes,
            },
            null,
            2,
          ),
        );
      });
    });

  program
    .command('history')
    .description('Print recent monitor runs, newest first')
    .option('--limit <n>', 'Maximum rows (1-500)', '50')
    .action(async (opts: { limit: string }) => {
      const limit = Number(opts.limit);
      if (!Number.isInteger(limit) || limit < 1) {
        program.error(`Invalid --limit: ${opts.limit}`);
      }
      await withContext(makeContext, async (ctx) => {
        const runs = await ctx.history.list(limit);
        console.log(JSON.stringify({ runs: runs.map(toPublicRun) }, null, 2));
      });
    });

  program
    .command('warn')
    .argument('<shipmentId>', 'Shipment to evaluate')
    .option('--email <email>', 'Recipient email')
    .option('--phone <phone>', 'Recipient phone for SMS')
    .option('--language <lang>', 'Notification language (en, es, zh)')
    .description('Send a proactive delay warning when the prediction is confident enough')
    .action(
      async (shipmentId: string, opts: { email?: string; phone?: string; language?: string }) => {
        await withContext(makeContext, async (ctx) => {
          const result = await ctx.delayWarning.warn({ shipmentId, ...opts });
          console.log(JSON.stringify(result, null, 2));
        });
      },
    );

  return program;
}

async function defaultContext(): Promise<MonitorContext> {
  return createMonitorContext(loadConfig());
}

async function withContext(
  makeContext: () => Promise<MonitorContext>,
  fn: (ctx: MonitorContext) => Promise<void>,
) {
  const ctx = await makeContext();
  try {
    await fn(ctx);
  } finally {
    await ctx.close();
  }
}

// npm links the bin, so compare resolved paths
const invokedDirectly =
  process.argv[1] !== undefined &&
  existsSync(process.argv[1]) &&
  import.meta.url === pathToFileURL(realpathSync(process.argv[1])).href;

if (invokedDirectly) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((err) => {
      getLogger().error({ err }, 'CLI command failed');
      process.exit(1);
    });
}
