/**
 * MATLAB build-script renderer.
 *
 * Every block and every line is emitted inside its own try/catch so that one
 * bad name or library path cannot stop the rest of the model from building.
 * The script is well-formed text; whether each statement succeeds is up to
 * Simulink when the script runs.
 */

import { ArchitectureGraph, BlockPosition, Component, ComponentType, KnownComponentKind } from './graph_types';
import { DEFAULT_SYSTEM_NAME } from './schema_validator';

/** MATLAB namelengthmax */
export const MAX_MODEL_NAME_CHARS = 63;

const INDENT = '    ';

const LIBRARY_PATHS: Record<KnownComponentKind, string> = {
    Inport: 'simulink/Sources/In1',
    Outport: 'simulink/Sinks/Out1',
    Gain: 'simulink/Math Operations/Gain',
    Sum: 'simulink/Math Operations/Add',
    Integrator: 'simulink/Continuous/Integrator',
    Subsystem: 'built-in/Subsystem',
    StateflowChart: 'sflib/Chart',
    ModelReference: 'simulink/Ports & Subsystems/Model',
    Constant: 'simulink/Sources/Constant',
    Scope: 'simulink/Sinks/Scope',
    Product: 'simulink/Math Operations/Product',
    Switch: 'simulink/Signal Routing/Switch',
    Saturation: 'simulink/Discontinuities/Saturation',
};

export const FALLBACK_LIBRARY_PATH = 'built-in/Subsystem';

export const GRID = {
    ORIGIN_X: 100,
    ORIGIN_Y: 100,
    STEP_X: 150,
    STEP_Y: 100,
    BLOCK_WIDTH: 50,
    BLOCK_HEIGHT: 30,
    COLUMNS: 4,
};

export interface BuildScriptOptions {
    /** Clock for the "Generated:" header line */
    now?: () => Date;
}

export interface BuildScriptReport {
    text: string;
    warnings: string[];
}

export function libraryPath(type: ComponentType): string {
    return type.kind === 'Other' ? FALLBACK_LIBRARY_PATH : LIBRARY_PATHS[type.kind];
}

export function sanitizeSystemName(raw: string): string {
    let name = raw.trim().replace(/\s+/g, '_').replace(/[^A-Za-z0-9_]/g, '');
    if (name.length === 0) return DEFAULT_SYSTEM_NAME;
    if (!/^[A-Za-z]/.test(name)) name = `M_${name}`;
    return name.slice(0, MAX_MODEL_NAME_CHARS);
}

export function sanitizeBlockName(raw: string, index: number): string {
    const name = raw.trim().replace(/\s+/g, '_').replace(/[^A-Za-z0-9_]/g, '');
    return name.length > 0 ? name : `Block_${index + 1}`;
}

/** Keeps the "/port" suffix; drops everything Simulink would reject. */
export function sanitizeEndpoint(raw: string): string {
    return raw.trim().replace(/\s+/g, '_').replace(/[^A-Za-z0-9_/]/g, '');
}

export function gridPosition(slot: number): BlockPosition {
    const column = slot % GRID.COLUMNS;
    const row = Math.floor(slot / GRID.COLUMNS);
    const left = GRID.ORIGIN_X + column * GRID.STEP_X;
    const top = GRID.ORIGIN_Y + row * GRID.STEP_Y;
    return [left, top, left + GRID.BLOCK_WIDTH, top + GRID.BLOCK_HEIGHT];
}

/** MATLAB char literal */
function q(value: string): string {
    return `'${value.replace(/[\r\n]+/g, ' ').replace(/'/g, "''")}'`;
}

function commentText(value: string): string {
    return value.replace(/[\r\n]+/g, ' ');
}

function errorMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}

function blockStatements(
    component: Component,
    index: number,
    systemName: string,
    position: BlockPosition,
    warnings: string[]
): string[] {
    const blockName = sanitizeBlockName(component.name, index);
    const blockPath = `${systemName}/${blockName}`;

    const lines: string[] = ['try'];
    lines.push(`${INDENT}add_block(${q(libraryPath(component.type))}, ${q(blockPath)});`);

    for (const [key, value] of Object.entries(component.parameters)) {
        if (key.trim() === '') {
            warnings.push(`components[${index}] "${component.name}" has a parameter with an empty name; skipped`);
            continue;
        }
        lines.push(`${INDENT}set_param(${q(blockPath)}, ${q(key)}, ${q(value)});`);
    }

    lines.push(`${INDENT}set_param(${q(blockPath)}, 'Position', [${position.join(', ')}]);`);
    lines.push('catch err');
    lines.push(`${INDENT}warning('Could not create block %s: %s', ${q(blockName)}, err.message);`);
    lines.push('end');
    return lines;
}

function assemble(graph: ArchitectureGraph, now: () => Date, warnings: string[]): string[] {
    const systemName = sanitizeSystemName(graph.systemName);
    const components = graph.components;
    const connections = graph.connections;

    const lines: string[] = [
        `% Auto-generated MBD build script for: ${systemName}`,
        `% Generated: ${now().toISOString()}`,
        'bdclose all; clear; clc;',
        `new_system(${q(systemName)});`,
        `open_system(${q(systemName)});`,
        '',
        '% Adding blocks...',
    ];

    let gridSlot = 0;
    components.forEach((component, index) => {
        try {
            const position = component.position ?? gridPosition(gridSlot++);
            lines.push(...blockStatements(component, index, systemName, position, warnings));
        } catch (e) {
            warnings.push(`components[${index}] skipped in build script: ${errorMessage(e)}`);
            lines.push(`% Skipped component ${index + 1}: ${commentText(errorMessage(e))}`);
        }
    });

    lines.push('');
    lines.push('% Connecting blocks...');
    connections.forEach((connection, index) => {
        try {
            const src = sanitizeEndpoint(connection.source);
            const dst = sanitizeEndpoint(connection.destination);
            if (src.split('/')[0] === '' || dst.split('/')[0] === '') {
                warnings.push(`connections[${index}] skipped in build script: empty endpoint`);
                lines.push(`% Skipped connection ${index + 1}: empty endpoint`);
                return;
            }
            lines.push('try');
            if (connection.label) {
                lines.push(`${INDENT}line_handle = add_line(${q(systemName)}, ${q(src)}, ${q(dst)}, 'autorouting', 'on');`);
                lines.push(`${INDENT}set_param(line_handle, 'Name', ${q(connection.label)});`);
            } else {
                lines.push(`${INDENT}add_line(${q(systemName)}, ${q(src)}, ${q(dst)}, 'autorouting', 'on');`);
            }
            lines.push('catch err');
            lines.push(`${INDENT}warning('Could not connect %s to %s: %s', ${q(src)}, ${q(dst)}, err.message);`);
            lines.push('end');
        } catch (e) {
            warnings.push(`connections[${index}] skipped in build script: ${errorMessage(e)}`);
            lines.push(`% Skipped connection ${index + 1}: ${commentText(errorMessage(e))}`);
        }
    });

    lines.push('');
    lines.push(`save_system(${q(systemName)});`);
    lines.push(`disp(${q(`Model ${systemName} built successfully.`)});`);
    return lines;
}

export function renderBuildScriptReport(graph: ArchitectureGraph, options: BuildScriptOptions = {}): BuildScriptReport {
    const now = options.now ?? (() => new Date());
    const warnings: string[] = [];
    try {
        return { text: assemble(graph, now, warnings).join('\n'), warnings };
    } catch (e) {
        const message = commentText(errorMessage(e));
        return {
            text: `% Build script could not be generated: ${message}`,
            warnings: [...warnings, `Build script generation failed: ${message}`],
        };
    }
}

export function renderBuildScript(graph: ArchitectureGraph, options: BuildScriptOptions = {}): string {
    return renderBuildScriptReport(graph, options).text;
}
