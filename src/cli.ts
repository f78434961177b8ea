#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { existsSync, readFileSync, writeFileSync } from 'fs';
import { join, resolve } from 'path';
import { dump as dumpYaml } from 'js-yaml';
import { createConfigLoader, DEFAULT_CONFIG_MAP } from './config/loader';
import { describeRef, isBootstrapError } from './errors';
import { LogLevel, parseLogLevel, setLogLevel } from './logger';
import { BootstrapOrchestrator, plan } from './orchestration/bootstrap-orchestrator';
import { deriveKeySet, encodeKeySet } from './provisioning/credential-deriver';
import { KubernetesResourceStore } from './store/kubernetes-store';
import type { BootstrapConfig } from './types';

function packageVersion(): string {
  const manifest: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf8'));
  return typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string'
    ? manifest.version
    : '0.0.0';
}

function fail(spinnerText: string, error: unknown, verbose?: boolean): never {
  console.error(chalk.red(`❌ ${spinnerText}`));
  if (isBootstrapError(error)) {
    console.error(error.toCliOutput());
  } else {
    console.error(error instanceof Error ? error.message : String(error));
  }
  if (verbose) {
    console.error(error);
  }
  process.exit(1);
}

async function loadConfig(options: { config?: string; fromConfigMap?: boolean }, store?: KubernetesResourceStore): Promise<BootstrapConfig> {
  const loader = createConfigLoader();
  if (options.fromConfigMap && store) {
    return loader.loadFromConfigMap(store, DEFAULT_CONFIG_MAP);
  }
  return loader.load(resolve(process.cwd(), options.config ?? 'bootstrap.yml'));
}

const program = new Command();

program
  .name('cluster-bootstrap')
  .description('Provision platform infrastructure in a Kubernetes cluster')
  .version(packageVersion())
  .option('--log-level <level>', 'Log level (debug|info|warn|error)', 'warn')
  .hook('preAction', command => {
    const { logLevel } = command.opts<{ logLevel: string }>();
    setLogLevel(logLevel ? parseLogLevel(logLevel) : LogLevel.Warn);
  });

program
  .command('provision')
  .description('Create every missing platform resource in the current cluster')
  .option('-c, --config <path>', 'Path to configuration file', 'bootstrap.yml')
  .option('--from-config-map', `Read configuration from the ${DEFAULT_CONFIG_MAP.namespace}/${DEFAULT_CONFIG_MAP.name} ConfigMap`)
  .option('-v, --verbose', 'Print full error details')
  .action(async (options: { config: string; fromConfigMap?: boolean; verbose?: boolean }) => {
    const spinner = ora('Loading configuration...').start();
    const controller = new AbortController();
    process.once('SIGINT', () => controller.abort(new Error('interrupted')));

    try {
      const store = KubernetesResourceStore.fromDefaultKubeConfig();
      const config = await loadConfig(options, store);

      spinner.text = 'Provisioning...';
      const report = await new BootstrapOrchestrator(store, { signal: controller.signal }).provision(config);
      spinner.succeed('Provisioning completed');

      const created = report.resources.filter(outcome => outcome.status === 'created');
      console.log(chalk.green(`\n✅ Resources created: ${created.length}`));
      created.forEach(outcome => console.log(`  ${describeRef(outcome.ref)}`));

      for (const pipeline of report.pipelines) {
        if (pipeline.skipped) {
          console.log(chalk.yellow(`⏭️  ${pipeline.pipeline} stopped at ${pipeline.skipped.stage}: ${pipeline.skipped.reason}`));
        }
      }
      report.restarts.forEach(restart =>
        console.log(chalk.blue(`🔄 Restarted ${describeRef(restart.ref)} at ${restart.restartedAt}`))
      );

      console.log(chalk.gray(`\n⏱️  Took ${report.metadata.duration ?? 0}ms`));
      console.log(chalk.gray(`🆔 Run ID: ${report.metadata.runId}`));
    } catch (error) {
      spinner.fail('Provisioning failed');
      fail('Error:', error, options.verbose);
    }
  });

program
  .command('plan')
  .description('Show the resources provisioning would create, without a cluster')
  .option('-c, --config <path>', 'Path to configuration file', 'bootstrap.yml')
  .option('-v, --verbose', 'Print full error details')
  .action(async (options: { config: string; verbose?: boolean }) => {
    const spinner = ora('Planning...').start();
    try {
      const config = await loadConfig(options);
      const result = await plan(config);
      spinner.succeed(`Planned ${result.resources.length} resources`);

      console.log(dumpYaml(result.resources, { noRefs: true, lineWidth: 120 }).trimEnd());
      result.pipelines
        .filter(pipeline => pipeline.skipped)
        .forEach(pipeline =>
          console.log(chalk.yellow(`⏭️  ${pipeline.pipeline} stops at ${pipeline.skipped?.stage}: ${pipeline.skipped?.reason}`))
        );
      result.blocked.forEach(block =>
        console.log(chalk.yellow(`⏸️  ${block.pipeline} waits at ${block.stage}: ${block.reason}`))
      );
    } catch (error) {
      spinner.fail('Planning failed');
      fail('Error:', error, options.verbose);
    }
  });

program
  .command('jwks')
  .description('Print the JSON Web Key Set for an RSA certificate')
  .argument('<certificate>', 'PEM encoded certificate file')
  .option('--kid <id>', 'Key ID', 'registry-auth-jwt-signer')
  .action((certificate: string, options: { kid: string }) => {
    try {
      console.log(encodeKeySet(deriveKeySet(readFileSync(certificate), options.kid)));
    } catch (error) {
      fail('Could not derive key set:', error);
    }
  });

program
  .command('init')
  .description('Write a sample configuration file')
  .option('-d, --domain <domain>', 'Base domain', 'example.com')
  .option('-e, --email <email>', 'ACME account email', 'admin@example.com')
  .option('-o, --output <path>', 'Output configuration file path', 'bootstrap.yml')
  .option('-f, --force', 'Overwrite an existing file')
  .action((options: { domain: string; email: string; output: string; force?: boolean }) => {
    const spinner = ora('Writing configuration...').start();
    try {
      if (existsSync(options.output) && !options.force) {
        throw new Error(`${options.output} already exists; use --force to overwrite it`);
      }

      const yamlContent = `# cluster-bootstrap configuration
# Generated on ${new Date().toISOString()}

domain: ${options.domain}
acmeEmail: ${options.email}
acmeEnvironment: staging   # switch to production once issuance works
gatewayClassName: cilium
# webhookUrl: \${WEBHOOK_TARGET_URL}

naming:
  platformNamespace: platform
  registryNamespace: registry
  buildkitNamespace: buildkit
  # prefix: dev

polling:
  intervalMs: 5000
  timeoutMs: 300000
  backoffFactor: 1

components:
  storage: true
  acmeDns: true
  ingress: true
  registry: true
  buildkit: true
  webhook: true

acmeDns:
  # registrationUrl: http://acme-dns.platform.svc.cluster.local
  allowFrom: []
`;

      writeFileSync(options.output, yamlContent);
      spinner.succeed(`Configuration file created: ${options.output}`);
      console.log(chalk.green('\n✅ Next steps:'));
      console.log('1. Review the configuration file');
      console.log(`2. Preview with: ${chalk.cyan(`cluster-bootstrap plan -c ${options.output}`)}`);
      console.log(`3. Run: ${chalk.cyan(`cluster-bootstrap provision -c ${options.output}`)}`);
    } catch (error) {
      spinner.fail('Initialization failed');
      fail('Error:', error);
    }
  });

program.on('command:*', () => {
  console.error(chalk.red('❌ Invalid command. See --help for available commands.'));
  process.exit(1);
});

program.parseAsync().catch(error => fail('Error:', error));
