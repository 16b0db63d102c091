#!/usr/bin/env node

import { Command } from 'commander';
import { join, isAbsolute } from 'path';
import { AbusePreventionEngine } from '../core/AbusePreventionEngine';
import { GuardScheduler } from '../core/GuardScheduler';
import { GuardServer } from '../server/GuardServer';
import { AuditLog, AuditKind } from '../audit/AuditLog';
import { createAuditListeners } from '../audit/listeners';
import { createConfig, loadConfig, saveConfig, validateConfig } from '../config/GuardConfig';
import { loadScenario, runScenario } from '../simulation/ScenarioRunner';
import { ServeOptions } from '../types';
import { formatSubjectId, isObject } from '../utils';

const DEFAULT_CONFIG_PATH = 'config/playguard.json';
const DEFAULT_AUDIT_PATH = 'data/guard-audit.jsonl';

const program = new Command();

function resolvePath(p: string): string {
  return isAbsolute(p) ? p : join(process.cwd(), p);
}

function parseOverride(value: string): unknown {
  const raw = value.trim();
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  if (raw === 'null') return null;
  if (/^-?\d+(\.\d+)?$/.test(raw)) return Number(raw);
  if ((raw.startsWith('{') && raw.endsWith('}')) || (raw.startsWith('[') && raw.endsWith(']'))) {
    try {
      const parsed: unknown = JSON.parse(raw);
      return parsed;
    } catch {
      return raw;
    }
  }
  return raw;
}

function setByPath(target: Record<string, unknown>, path: string, value: unknown): void {
  const keys = path.split('.').map(k => k.trim()).filter(Boolean);
  if (keys.length === 0) throw new Error('Invalid config path');
  let ref = target;
  for (const key of keys.slice(0, -1)) {
    const next = ref[key];
    if (isObject(next)) {
      ref = next;
    } else {
      const created: Record<string, unknown> = {};
      ref[key] = created;
      ref = created;
    }
  }
  ref[keys[keys.length - 1]] = value;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

interface ServeCliOptions {
  port: string;
  host: string;
  apiKey?: string;
  cors: boolean;
  config: string;
  audit: string;
}

program
  .name('playguard')
  .description('Adaptive abuse prevention for game servers')
  .version('0.1.0');

// Serve command
program
  .command('serve')
  .description('Start the gating service (JSON-RPC + HTTP gate)')
  .option('-p, --port <port>', 'Port to listen on', '3480')
  .option('-H, --host <host>', 'Host to bind to', 'localhost')
  .option('-k, --api-key <key>', 'API key for JSON-RPC and /gate (auto-generated if public bind)')
  .option('--no-cors', 'Disable CORS')
  .option('--config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
  .option('--audit <path>', 'Path to audit log (JSONL)', DEFAULT_AUDIT_PATH)
  .action(async (options: ServeCliOptions) => {
    try {
      const serveOptions: ServeOptions = {
        port: parseInt(options.port, 10),
        host: options.host,
        apiKey: options.apiKey,
        cors: options.cors,
        configPath: resolvePath(options.config),
        auditPath: resolvePath(options.audit)
      };

      console.log('Loading configuration...');
      const config = loadConfig(serveOptions.configPath ?? DEFAULT_CONFIG_PATH);
      const audit = new AuditLog(serveOptions.auditPath ?? DEFAULT_AUDIT_PATH);
      const engine = new AbusePreventionEngine({ config, listeners: createAuditListeners(audit) });
      const scheduler = new GuardScheduler(engine);
      const server = new GuardServer(engine, serveOptions, audit);

      console.log('Starting PlayGuard...');
      scheduler.start();
      await server.start();

      const shutdown = async (): Promise<void> => {
        console.log('\nShutting down...');
        scheduler.stop();
        try {
          await server.stop();
          await audit.flush();
          process.exit(0);
        } catch (error) {
          console.error('❌ Shutdown failed:', errorMessage(error));
          process.exit(1);
        }
      };
      process.on('SIGINT', () => { void shutdown(); });
      process.on('SIGTERM', () => { void shutdown(); });
    } catch (error) {
      console.error('❌ Failed to start server:', errorMessage(error));
      process.exit(1);
    }
  });

// Replay a scenario file against a fresh engine
program
  .command('simulate')
  .description('Replay a scenario file on a simulated clock and print the outcome')
  .argument('<scenario>', 'Path to scenario JSON')
  .option('--json', 'Print the full report as JSON', false)
  .action((scenarioPath: string, options: { json: boolean }) => {
    try {
      const report = runScenario(loadScenario(resolvePath(scenarioPath)));
      if (options.json) {
        console.log(JSON.stringify(report, null, 2));
        return;
      }

      console.log(`Scenario: ${report.name} (${report.duration}s simulated)`);
      console.log(`  requests allowed: ${report.requests.allowed}`);
      console.log(`  requests denied:  ${report.requests.denied}`);
      console.log(`\nEvents (${report.events.length})`);
      for (const evt of report.events) {
        console.log(`- t=${evt.at.toFixed(2)} ${formatSubjectId(evt.subjectId)} ${evt.kind}: ${evt.detail}`);
      }
      console.log('\nSubjects still tracked');
      for (const [id, s] of Object.entries(report.subjects)) {
        console.log(`- ${formatSubjectId(id)} ${s.behaviorCategory} risk=${s.riskScore} anomaly=${s.anomalyScore} ` +
          `throttle=x${s.throttleMultiplier} trust=${s.trustScore}`);
      }
    } catch (error) {
      console.error('❌ Simulation failed:', errorMessage(error));
      process.exit(1);
    }
  });

// Show or update config
program
  .command('config')
  .description('Show or update the effective configuration')
  .option('--config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
  .option('--set <path=value>', 'Set a config value (repeatable)', (value: string, prev: string[]) => {
    prev.push(value);
    return prev;
  }, [] as string[])
  .action((options: { config: string; set: string[] }) => {
    try {
      const path = resolvePath(options.config);
      const config = loadConfig(path);

      if (options.set.length > 0) {
        const draft: Record<string, unknown> = JSON.parse(JSON.stringify(config));
        for (const update of options.set) {
          const idx = update.indexOf('=');
          if (idx <= 0) {
            throw new Error(`Invalid --set value "${update}". Use path=value`);
          }
          setByPath(draft, update.substring(0, idx).trim(), parseOverride(update.substring(idx + 1)));
        }
        const updated = createConfig(draft);
        const problems = validateConfig(updated);
        if (problems.length > 0) {
          throw new Error(problems.join('; '));
        }
        saveConfig(path, updated);
        console.log(`Config path: ${path}`);
        console.log(JSON.stringify(updated, null, 2));
        return;
      }

      console.log(`Config path: ${path}`);
      console.log(JSON.stringify(config, null, 2));
    } catch (error) {
      console.error('❌ Failed to show/update config:', errorMessage(error));
      process.exit(1);
    }
  });

// Audit trail
program
  .command('audit')
  .description('Show recent anomalies, violations and evictions from the audit log')
  .option('--audit <path>', 'Path to audit log (JSONL)', DEFAULT_AUDIT_PATH)
  .option('--limit <n>', 'How many events to display', '20')
  .option('--kind <kind>', 'Filter to one kind (anomaly, violation, eviction)')
  .action((options: { audit: string; limit: string; kind?: string }) => {
    try {
      const kinds: AuditKind[] = ['anomaly', 'violation', 'eviction'];
      const kind = kinds.find(k => k === options.kind);
      if (options.kind && !kind) {
        throw new Error(`Unknown kind "${options.kind}". Use ${kinds.join(', ')}`);
      }
      const audit = new AuditLog(resolvePath(options.audit));
      const limit = Math.max(1, parseInt(options.limit, 10) || 20);
      const events = audit.list(limit, kind);

      if (events.length === 0) {
        console.log('No audit events recorded yet.');
        return;
      }
      console.log(`Recent audit events (${events.length})`);
      for (const evt of events) {
        console.log(`- ${evt.ts} [${evt.kind}] ${formatSubjectId(evt.subjectId)}`);
        if (evt.details && Object.keys(evt.details).length > 0) {
          console.log(`  details: ${JSON.stringify(evt.details)}`);
        }
      }
    } catch (error) {
      console.error('❌ Failed to read audit log:', errorMessage(error));
      process.exit(1);
    }
  });

// Health check command
program
  .command('health')
  .description('Check a running service')
  .option('-u, --url <url>', 'Health endpoint URL', 'http://localhost:3480/health')
  .action(async (options: { url: string }) => {
    try {
      const response = await fetch(options.url);
      if (!response.ok) {
        throw new Error(`HTTP ${response.status}: ${response.statusText}`);
      }
      const health: unknown = await response.json();
      if (!isObject(health)) throw new Error('Unexpected health response');
      console.log('✅ PlayGuard Health Status:');
      console.log(`  Status: ${String(health.status)}`);
      console.log(`  Timestamp: ${String(health.timestamp)}`);
      console.log(`  Subjects: ${String(health.subjects)}`);
      console.log(`  Escalated: ${String(health.escalatedSubjects)}`);
    } catch (error) {
      console.error('❌ Health check failed:', errorMessage(error));
      process.exit(1);
    }
  });

// Parse command line arguments
program.parse(process.argv);

// Show help if no arguments
if (!process.argv.slice(2).length) {
  program.outputHelp();
}
