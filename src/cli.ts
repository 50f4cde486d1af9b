/**
 * CLI Entry Point for MBD Architect
 */

import * as fs from 'fs';
import * as path from 'path';
import {
    ConfigError,
    DEFAULT_OUTPUT_DIR,
    defaultConfigDir,
    defaultConfigPath,
    loadSessionConfig,
    SessionConfig,
} from './config';
import { ModelRouter, Oracle } from './model_router';
import { PipelineOrchestrator, PipelineResult } from './pipeline_orchestrator';
import { JsonlRunHistory, RunHistory } from './run_history';
import { readSourceFile, SourceFile } from './document_extractor';
import { readGraphFile } from './graph_file';
import { parseInputKind } from './input_kind';
import { InputKind } from './graph_types';
import { writeArtifacts } from './output_writer';
import { buildDiagramImageUrl } from './diagram_url';
import { DocumentExtractionError, OracleError } from './structured_error';
import { createLogger } from './logger';

const log = createLogger('cli');

export interface ParsedArgs {
    positionals: string[];
    flags: Record<string, string>;
}

/** Split `args` into positionals and `--flag value` pairs. */
export function parseCommandArgs(args: readonly string[], valueFlags: readonly string[]): ParsedArgs {
    const positionals: string[] = [];
    const flags: Record<string, string> = {};
    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg.startsWith('--')) {
            const name = arg.slice(2);
            if (!valueFlags.includes(name)) {
                throw new Error(`Unknown option: ${arg}`);
            }
            const value = args[i + 1];
            if (value === undefined || value.startsWith('--')) {
                throw new Error(`${arg} requires a value`);
            }
            flags[name] = value;
            i++;
        } else {
            positionals.push(arg);
        }
    }
    return { positionals, flags };
}

// `render` never reaches the oracle; this one only exists to satisfy the session.
const offlineOracle: Oracle = {
    generate: async () => {
        throw new OracleError('AUTH', 'the render command does not call the oracle', false);
    },
};

class MbdArchitectCLI {
    async run(args: string[]): Promise<void> {
        const command = args[2] || 'help';
        const rest = args.slice(3);

        switch (command) {
            case 'init':
                this.runInit();
                break;
            case 'generate':
                await this.runGenerate(rest);
                break;
            case 'render':
                await this.runRender(rest);
                break;
            case 'history':
                this.runHistory(rest);
                break;
            case 'help':
                this.showHelp();
                break;
            default:
                console.error(`Unknown command: ${command}`);
                this.showHelp();
                process.exitCode = 1;
        }
    }

    private loadConfig(): SessionConfig | null {
        try {
            return loadSessionConfig();
        } catch (e) {
            if (!(e instanceof ConfigError)) throw e;
            console.error(`Error: ${e.message}`);
            process.exitCode = 1;
            return null;
        }
    }

    private parse(args: string[], valueFlags: string[], usage: string): ParsedArgs | null {
        try {
            return parseCommandArgs(args, valueFlags);
        } catch (e) {
            console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
            console.error(`Usage: ${usage}`);
            process.exitCode = 1;
            return null;
        }
    }

    private runInit(): void {
        console.log('Initializing MBD Architect...');

        const configDir = defaultConfigDir();
        const configPath = defaultConfigPath();

        if (fs.existsSync(configPath)) {
            console.log('Configuration already exists at:', configPath);
            console.log('   To reinitialize, delete the existing config first.');
            return;
        }

        const apiKey = process.env.OPENROUTER_API_KEY || '';
        if (!apiKey) {
            console.error('Error: OPENROUTER_API_KEY environment variable not set');
            if (process.platform === 'win32') {
                console.error('   Please set it with: setx OPENROUTER_API_KEY "sk-or-..."');
            } else {
                console.error('   Please set it with: export OPENROUTER_API_KEY=sk-or-...');
            }
            process.exitCode = 1;
            return;
        }
        if (!apiKey.startsWith('sk-or-')) {
            console.warn('Warning: API key does not start with "sk-or-" (expected format for OpenRouter)');
        }

        fs.mkdirSync(configDir, { recursive: true });
        const config = {
            apiKey,
            historyPath: path.join(configDir, 'history.jsonl'),
            debug: false,
        };
        fs.writeFileSync(configPath, JSON.stringify(config, null, 2), { mode: 0o600 });

        console.log('\nMBD Architect initialized successfully.');
        console.log(`   Config: ${configPath}`);
        console.log(`   History: ${config.historyPath}`);
        console.log('\nNext step:');
        console.log('   mbdarch generate <controller.c ...>');
    }

    private async runGenerate(args: string[]): Promise<void> {
        const usage = 'mbdarch generate <files...> [--out <dir>] [--kind code|requirements]';
        const parsed = this.parse(args, ['out', 'kind'], usage);
        if (!parsed) return;
        if (parsed.positionals.length === 0) {
            console.error(`Usage: ${usage}`);
            process.exitCode = 1;
            return;
        }

        let kind: InputKind | undefined;
        if (parsed.flags.kind !== undefined) {
            const k = parseInputKind(parsed.flags.kind);
            if (!k) {
                console.error(`Error: --kind must be "code" or "requirements", got "${parsed.flags.kind}"`);
                process.exitCode = 1;
                return;
            }
            kind = k;
        }

        const config = this.loadConfig();
        if (!config) return;
        if (!config.apiKey) {
            console.error('Error: no API key configured. Set OPENROUTER_API_KEY or run `mbdarch init`.');
            process.exitCode = 1;
            return;
        }

        let files: SourceFile[];
        try {
            files = parsed.positionals.map((p) => readSourceFile(p));
        } catch (e) {
            if (!(e instanceof DocumentExtractionError)) throw e;
            console.error(`Error: ${e.message}`);
            process.exitCode = 1;
            return;
        }

        const oracle = new ModelRouter({
            apiKey: config.apiKey,
            modelId: config.modelId,
            endpoint: config.endpoint,
            debug: config.debug,
        });

        await this.withHistory(config, async (history) => {
            const pipeline = new PipelineOrchestrator({ oracle, history, debug: config.debug });
            console.log(`Generating architecture from ${files.length} file(s)...`);
            const result = await pipeline.generateFromFiles(files, kind);
            this.report(result, parsed.flags.out ?? DEFAULT_OUTPUT_DIR);
        });
    }

    private async runRender(args: string[]): Promise<void> {
        const usage = 'mbdarch render <graph.json> [--out <dir>]';
        const parsed = this.parse(args, ['out'], usage);
        if (!parsed) return;
        const graphPath = parsed.positionals[0];
        if (!graphPath || parsed.positionals.length > 1) {
            console.error(`Usage: ${usage}`);
            process.exitCode = 1;
            return;
        }

        const file = readGraphFile(graphPath);
        if (!file.ok) {
            console.error(`Error: ${file.reason}`);
            process.exitCode = 1;
            return;
        }

        const config = this.loadConfig();
        if (!config) return;

        await this.withHistory(config, async (history) => {
            const pipeline = new PipelineOrchestrator({ oracle: offlineOracle, history, debug: config.debug });
            const result = await pipeline.renderExisting(file.value);
            this.report(result, parsed.flags.out ?? DEFAULT_OUTPUT_DIR);
        });
    }

    private runHistory(args: string[]): void {
        const usage = 'mbdarch history [--limit N]';
        const parsed = this.parse(args, ['limit'], usage);
        if (!parsed) return;

        let limit = 20;
        if (parsed.flags.limit !== undefined) {
            limit = Number(parsed.flags.limit);
            if (!Number.isInteger(limit) || limit < 1) {
                console.error(`Error: --limit must be a positive integer, got "${parsed.flags.limit}"`);
                process.exitCode = 1;
                return;
            }
        }

        const config = this.loadConfig();
        if (!config) return;
        if (!fs.existsSync(config.historyPath)) {
            console.log('No runs recorded yet.');
            return;
        }

        const history = new JsonlRunHistory(config.historyPath);
        try {
            const records = history.list(limit);
            if (records.length === 0) {
                console.log('No runs recorded yet.');
                return;
            }
            console.log('TIMESTAMP                 RESULT  ATTEMPTS  SOURCE          SYSTEM / ERROR');
            for (const r of records) {
                const outcome = r.success ? 'ok' : 'FAILED';
                const detail = r.success ? (r.systemName ?? '') : (r.errorCode ?? 'unexpected error');
                console.log(
                    `${r.timestamp.padEnd(26)}${outcome.padEnd(8)}${String(r.attempts).padEnd(10)}${r.source.padEnd(16)}${detail}`
                );
            }
        } finally {
            history.close();
        }
    }

    private async withHistory(config: SessionConfig, body: (history: RunHistory) => Promise<void>): Promise<void> {
        const history = new JsonlRunHistory(config.historyPath);
        try {
            await body(history);
        } finally {
            history.close();
        }
    }

    private report(result: PipelineResult, outDir: string): void {
        if (!result.ok) {
            console.error(`\nRun failed after ${result.attempts} attempt(s): [${result.error.code}] ${result.error.message}`);
            for (const option of result.error.recovery_options) {
                console.error(`   - ${option.description}`);
            }
            if (result.rawResponse !== undefined) {
                console.error('\nRaw oracle reply:');
                console.error(result.rawResponse);
            }
            process.exitCode = 1;
            return;
        }

        const written = writeArtifacts(outDir, result.artifacts);
        for (const w of written.warnings) log.warn(w);

        console.log(`\nArchitecture "${result.graph.systemName}" designed in ${result.attempts} attempt(s).`);
        console.log(`   Components: ${result.graph.components.length}, connections: ${result.graph.connections.length}`);
        console.log(`   Graph:        ${written.graphPath}`);
        console.log(`   Diagram:      ${written.diagramPath}`);
        console.log(`   Build script: ${written.buildScriptPath}`);

        const image = buildDiagramImageUrl(result.artifacts.diagram);
        if (image.ok) {
            console.log(`   Preview:      ${image.url}`);
        } else {
            console.log(`   Preview:      diagram too large for a preview link (${image.length} > ${image.limit} chars); render ${written.diagramPath} locally`);
        }

        if (result.warnings.length > 0) {
            console.log(`\n${result.warnings.length} warning(s):`);
            for (const w of result.warnings) console.log(`   - ${w}`);
        }
    }

    private showHelp(): void {
        console.log(`
MBD Architect - C/C++ sources and requirements to Simulink architecture

Usage:
  mbdarch init                                   Create ~/.mbd-architect/config.json
  mbdarch generate <files...> [--out <dir>] [--kind code|requirements]
                                                 Propose an architecture and write artifacts
  mbdarch render <graph.json> [--out <dir>]      Re-render an exported mbd_model.json
  mbdarch history [--limit N]                    Show recent runs
  mbdarch help                                   Show this help

Artifacts (default directory: ./${DEFAULT_OUTPUT_DIR}):
  mbd_model.json   architecture graph
  diagram.mmd      Mermaid diagram
  build_model.m    MATLAB script that builds the Simulink model

Environment:
  OPENROUTER_API_KEY, MBD_MODEL, MBD_ORACLE_ENDPOINT, MBD_TEMPERATURE,
  MBD_MAX_ATTEMPTS, MBD_MAX_INPUT_CHARS, MBD_ORACLE_TIMEOUT_MS, MBD_HISTORY_FILE,
  MBD_LOG_LEVEL, MBD_LOG_JSON, MBD_LOG_FILE, MBD_DEBUG
`);
    }
}

// Run CLI
if (require.main === module) {
    const cli = new MbdArchitectCLI();
    cli.run(process.argv).catch((err: unknown) => {
        console.error('Fatal error:', err);
        process.exitCode = 1;
    });
}

export { MbdArchitectCLI };
