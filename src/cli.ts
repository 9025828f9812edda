/**
 * Cronark CLI
 *
 * Command-line interface meant to be invoked from a crontab.
 *
 * @packageDocumentation
 */

import { Command } from 'commander';
import { createCronarkFromFile, type ConfiguredCronark } from './config/index.js';
import { getDefaultPaths } from './constants.js';
import type { Cronark } from './core/scheduler.js';
import type { WorkerName } from './types.js';

// =============================================================================
// Helper Functions
// =============================================================================

interface ConfigOptions {
  config?: string;
  db?: string;
}

/**
 * Load the config and hand the instance to `fn`, closing the store after.
 */
async function withCronark(
  options: ConfigOptions,
  fn: (configured: ConfiguredCronark) => Promise<void> | void,
  diagnostics = false
): Promise<void> {
  const { configPath } = getDefaultPaths();
  const configured = await createCronarkFromFile(options.config ?? configPath, {
    dbPath: options.db,
    diagnostics: diagnostics ? undefined : false,
  });

  try {
    await fn(configured);
  } finally {
    configured.store.close();
  }
}

/**
 * Fail with exit code 1 when the worker is not in the config.
 */
function assertWorker(cronark: Cronark, worker: WorkerName): void {
  if (!cronark.registry.isRegistered(worker)) {
    console.error(`Worker '${worker}' is not configured.`);
    process.exit(1);
  }
}

function formatValue(value: string | number | boolean | null): string {
  return value === null ? '-' : String(value);
}

// =============================================================================
// CLI Program
// =============================================================================

const program = new Command();

program
  .name('cronark')
  .description('Cronark - cron-driven background job runner')
  .version('0.1.0');

// -----------------------------------------------------------------------------
// cronark start
// -----------------------------------------------------------------------------

program
  .command('start')
  .description('Claim a worker and run its jobs until superseded')
  .argument('<worker>', 'Worker name')
  .option('-c, --config <path>', 'Path to config file')
  .option('--db <path>', 'Path to state database')
  .action(async (worker: string, options: ConfigOptions) => {
    try {
      await withCronark(
        options,
        async ({ cronark, store }) => {
          const shutdown = (signal: string): void => {
            cronark.print(`Received ${signal}, exiting`, worker);
            store.close();
            process.exit(0);
          };

          process.on('SIGTERM', () => shutdown('SIGTERM'));
          process.on('SIGINT', () => shutdown('SIGINT'));

          await cronark.start(worker);
        },
        true
      );
    } catch (error) {
      console.error('Error starting worker:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

// -----------------------------------------------------------------------------
// cronark status
// -----------------------------------------------------------------------------

program
  .command('status')
  .description('Show stored state of workers')
  .argument('[worker]', 'Worker name (optional, shows all if not specified)')
  .option('-c, --config <path>', 'Path to config file')
  .option('--db <path>', 'Path to state database')
  .action(async (worker: string | undefined, options: ConfigOptions) => {
    try {
      await withCronark(options, ({ cronark }) => {
        const workers = worker ? [worker] : cronark.registry.workers();
        if (worker) {
          assertWorker(cronark, worker);
        }

        console.log('Cronark Status\n');
        console.log(`Registry hash: ${cronark.registry.hash()}`);
        console.log('─'.repeat(70));

        for (const name of workers) {
          const pid = cronark.getPid(name);
          const state = pid === null ? 'idle' : cronark.isActive(name) ? 'running' : 'stale';

          console.log(`\n  ${name} [${state}]`);
          console.log(`    Jobs:          ${cronark.registry.count(name)}`);
          console.log(`    PID:           ${formatValue(pid)}`);
          console.log(`    Job index:     ${formatValue(cronark.getCurrentIndex(name))}`);
          console.log(`    Jobs changed:  ${cronark.hashChanged(name) ? 'yes' : 'no'}`);
        }
      });
    } catch (error) {
      console.error('Error getting status:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

// -----------------------------------------------------------------------------
// cronark list
// -----------------------------------------------------------------------------

program
  .command('list')
  .description('List configured workers and their jobs')
  .option('-c, --config <path>', 'Path to config file')
  .option('--db <path>', 'Path to state database')
  .action(async (options: ConfigOptions) => {
    try {
      await withCronark(options, ({ cronark }) => {
        console.log('Configured Workers:\n');
        console.log('Worker'.padEnd(25) + 'Position'.padEnd(10) + 'Job');
        console.log('─'.repeat(70));

        for (const worker of cronark.registry.workers()) {
          const jobs = cronark.registry.jobs(worker);
          if (jobs.length === 0) {
            console.log(worker.padEnd(25) + '-'.padEnd(10) + '(no jobs)');
            continue;
          }
          jobs.forEach((jobType, position) => {
            console.log(worker.padEnd(25) + String(position).padEnd(10) + jobType);
          });
        }

        console.log(`\nTotal: ${cronark.registry.workers().length} workers, ${cronark.registry.count()} jobs`);
      });
    } catch (error) {
      console.error('Error listing workers:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

// -----------------------------------------------------------------------------
// cronark kill
// -----------------------------------------------------------------------------

program
  .command('kill')
  .description('Terminate the process running a worker')
  .argument('[worker]', 'Worker name')
  .option('-a, --all', 'Kill every configured worker')
  .option('-c, --config <path>', 'Path to config file')
  .option('--db <path>', 'Path to state database')
  .action(async (worker: string | undefined, options: ConfigOptions & { all?: boolean }) => {
    try {
      await withCronark(options, ({ cronark }) => {
        if (options.all) {
          const killed = cronark.killAll();
          console.log(killed.length > 0 ? `Killed: ${killed.join(', ')}` : 'No workers killed.');
          return;
        }

        if (!worker) {
          console.error('Name a worker or pass --all.');
          process.exit(1);
        }

        assertWorker(cronark, worker);
        const pid = cronark.getPid(worker);

        if (cronark.kill(worker)) {
          console.log(`Worker '${worker}' (PID ${pid}) stopped.`);
        } else {
          console.log(pid === null ? `Worker '${worker}' is not running.` : `Failed to stop PID ${pid}.`);
          process.exitCode = pid === null ? 0 : 1;
        }
      });
    } catch (error) {
      console.error('Error killing worker:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

// -----------------------------------------------------------------------------
// cronark reset
// -----------------------------------------------------------------------------

program
  .command('reset')
  .description('Forget the stored pid, job index and jobs hash of a worker')
  .argument('<worker>', 'Worker name')
  .option('-c, --config <path>', 'Path to config file')
  .option('--db <path>', 'Path to state database')
  .action(async (worker: string, options: ConfigOptions) => {
    try {
      await withCronark(options, ({ cronark }) => {
        assertWorker(cronark, worker);

        if (cronark.isActive(worker)) {
          console.error(`Worker '${worker}' is running under PID ${cronark.getPid(worker)}; kill it first.`);
          process.exit(1);
        }

        cronark.resetState(worker);
        console.log(`State of worker '${worker}' cleared.`);
      });
    } catch (error) {
      console.error('Error resetting worker:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

// -----------------------------------------------------------------------------
// Parse and run
// -----------------------------------------------------------------------------

program.parseAsync().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
