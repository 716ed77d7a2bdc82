#!/usr/bin/env node
import { Command } from 'commander';
import { loadConfig, type Config } from './config';
import { ProvisionController } from './controllers/provision.controller';
import { RollbackController } from './controllers/rollback.controller';
import { StorageSelector } from './controllers/storage-selector';
import { TemplateResolver } from './controllers/template-resolver';
import { ProvisioningError, errorMessage, exitCodeOf } from './lib/errors';
import logger from './lib/logger';
import { abortOnSignals } from './lib/signals';
import { AmqpService } from './services/amqp';
import { runCommand } from './services/command-runner';
import { KernelModules } from './services/kernel-modules';
import { TerminalMenuPrompt } from './services/menu-prompt';
import { ProxmoxHost } from './services/proxmox-host';
import { PveApi } from './services/pve-api';
import { stageSetupScript, type StagedScript } from './services/setup-script';
import type { ProvisioningResult } from './types/session';

const pkg = require('../package.json') as { version?: string };

type CliOptions = {
  osFamily: string;
  osVersion: string;
  storage?: string;
  setupScript: string;
  setupUrl?: string;
};

function formatReport(result: ProvisioningResult): string {
  return [
    '',
    '',
    'WebInterface is reachable by going to the following URLs.',
    '',
    ...result.endpoints.map((url) => `      ${url}`),
    '',
    '',
  ].join('\n');
}

function reportFailure(err: unknown, operation: string): number {
  const failure = ProvisioningError.from('InvalidConfiguration', operation, err);
  logger.error(`${failure.exitCode}@${failure.operation} ${failure.code}: ${failure.message}`);
  return failure.exitCode;
}

async function main(argv: string[]): Promise<number> {
  const program = new Command()
    .name('lxc-provision')
    .description('Create an LXC container on this Proxmox VE node and run its setup script')
    .version(pkg.version ?? 'unknown')
    .option('--os-family <family>', 'template OS family', 'debian')
    .option('--os-version <version>', 'template OS version prefix', '10')
    .option('--storage <tag>', 'storage pool for the root disk (skips the menu)')
    .option('--setup-script <path>', 'second-stage script pushed into the container', './setup.sh')
    .option('--setup-url <url>', 'download the second-stage script from this URL instead');
  program.parse(argv);
  const opts = program.opts<CliOptions>();

  const abort = new AbortController();
  const uninstallSignals = abortOnSignals(abort);
  try {
    return await run(opts, abort.signal);
  } finally {
    uninstallSignals();
  }
}

async function run(opts: CliOptions, signal: AbortSignal): Promise<number> {
  let config: Config;
  try {
    config = loadConfig();
  } catch (err) {
    return reportFailure(err, 'config');
  }

  let script: StagedScript;
  try {
    script = await stageSetupScript({ path: opts.setupScript, url: opts.setupUrl });
  } catch (err) {
    return reportFailure(err, 'setup.locate');
  }

  const publisher = config.broker
    ? new AmqpService({
        url: config.broker.url,
        resultsExchange: config.broker.resultsExchange,
        agentId: config.broker.agentId,
        connectAttempts: config.broker.connectAttempts,
      })
    : undefined;

  const api = new PveApi({
    baseUrl: config.pve.url,
    node: config.pve.node,
    tokenId: config.pve.tokenId,
    tokenSecret: config.pve.tokenSecret,
    allowInsecureTls: config.pve.insecureTls,
    taskTimeoutMs: config.pve.taskTimeoutMs,
    taskPollIntervalMs: config.pve.taskPollIntervalMs,
  });
  const host = new ProxmoxHost(api, runCommand, {
    templateStorage: config.provisioning.templateStorage,
    ipWaitTimeoutMs: config.provisioning.ipWaitTimeoutMs,
  });
  const controller = new ProvisionController(
    host,
    new StorageSelector(new TerminalMenuPrompt(process.stdin, process.stderr, signal)),
    new TemplateResolver(host, config.provisioning.templateStorage),
    new RollbackController(host),
    { bridge: config.provisioning.bridge, publisher, signal }
  );

  try {
    try {
      await new KernelModules(runCommand).ensure(config.provisioning.kernelModules);
    } catch (err) {
      return reportFailure(err, 'modules');
    }

    try {
      const result = await controller.provision({
        osFamily: opts.osFamily,
        osVersion: opts.osVersion,
        setupScriptPath: script.path,
        preferredStorage: opts.storage,
      });
      process.stdout.write(formatReport(result));
      return 0;
    } catch (err) {
      // Already logged by the controller.
      return exitCodeOf(err);
    }
  } finally {
    await script.cleanup();
    await publisher?.close().catch((err: unknown) => logger.warn(`Closing broker connection failed: ${errorMessage(err)}`));
  }
}

if (require.main === module) {
  main(process.argv).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      logger.error(errorMessage(err), { err });
      process.exitCode = 1;
    }
  );
}
