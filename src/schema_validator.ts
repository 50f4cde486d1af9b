/**
 * Schema Validator - structural checks for architecture graphs
 *
 * Oracle replies and exported graph files both pass through here before any
 * renderer sees them. Checks are ordered and stop at the first violation.
 * Element-level problems inside `connections` are left to the renderers,
 * which skip bad elements one at a time.
 */

import {
    ArchitectureGraph,
    BlockPosition,
    Component,
    Connection,
    parseComponentType,
} from './graph_types';

export type ValidationResult =
    | { ok: true; value: ArchitectureRecord }
    | { ok: false; reason: string };

/** Wire shape after validation; field values are still unchecked. */
export type ArchitectureRecord = Record<string, unknown> & {
    components: unknown[];
};

export const DEFAULT_SYSTEM_NAME = 'GenAI_Model';

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeType(value: unknown): string {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'array';
    return typeof value;
}

export function validateArchitecture(candidate: unknown): ValidationResult {
    if (!isRecord(candidate)) {
        return { ok: false, reason: `Architecture must be a JSON object, got ${describeType(candidate)}` };
    }

    if (!('system_name' in candidate) && !('systemName' in candidate)) {
        return { ok: false, reason: 'Missing "system_name" field' };
    }

    const components = candidate.components;
    if (components === undefined) {
        return { ok: false, reason: 'Missing "components" field' };
    }
    if (!Array.isArray(components)) {
        return { ok: false, reason: `"components" must be an array, got ${describeType(components)}` };
    }

    for (let i = 0; i < components.length; i++) {
        const c: unknown = components[i];
        if (!isRecord(c)) {
            return { ok: false, reason: `components[${i}] must be an object, got ${describeType(c)}` };
        }
        if (!('name' in c)) {
            return { ok: false, reason: `components[${i}] is missing "name"` };
        }
        if (!('type' in c)) {
            return { ok: false, reason: `components[${i}] is missing "type"` };
        }
    }

    if ('connections' in candidate && candidate.connections !== undefined && !Array.isArray(candidate.connections)) {
        return { ok: false, reason: `"connections" must be an array, got ${describeType(candidate.connections)}` };
    }

    return { ok: true, value: { ...candidate, components } };
}

/** Narrowing form of `validateArchitecture`. */
export function isArchitectureRecord(candidate: unknown): candidate is ArchitectureRecord {
    return validateArchitecture(candidate).ok;
}

/* -------------------------------------------------------------------------- */
/* Normalization                                                              */
/* -------------------------------------------------------------------------- */

export interface NormalizedGraph {
    graph: ArchitectureGraph;
    warnings: string[];
}

function scalarToString(value: unknown): string | undefined {
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    return undefined;
}

function toParameterValue(value: unknown): string {
    const scalar = scalarToString(value);
    if (scalar !== undefined) return scalar;
    if (value === null || value === undefined) return '';
    return JSON.stringify(value);
}

function toPosition(value: unknown): BlockPosition | undefined {
    if (!Array.isArray(value) || value.length !== 4) return undefined;
    const [left, top, right, bottom]: unknown[] = value;
    if (
        typeof left === 'number' && Number.isFinite(left) &&
        typeof top === 'number' && Number.isFinite(top) &&
        typeof right === 'number' && Number.isFinite(right) &&
        typeof bottom === 'number' && Number.isFinite(bottom)
    ) {
        return [left, top, right, bottom];
    }
    return undefined;
}

function toComponent(raw: Record<string, unknown>, index: number, warnings: string[]): Component {
    let name = scalarToString(raw.name);
    if (name === undefined) {
        warnings.push(`components[${index}] has a non-text name; using "Block_${index + 1}"`);
        name = `Block_${index + 1}`;
    }

    const rawType = scalarToString(raw.type);
    if (rawType === undefined) {
        warnings.push(`components[${index}] "${name}" has a non-text type; rendering as a subsystem`);
    }
    const type = parseComponentType(rawType ?? '');
    if (type.kind === 'Other' && rawType !== undefined) {
        warnings.push(`components[${index}] "${name}" has unknown type "${type.rawType}"; rendering as a subsystem`);
    }

    const parameters: Record<string, string> = {};
    if (isRecord(raw.parameters)) {
        for (const [key, value] of Object.entries(raw.parameters)) {
            parameters[key] = toParameterValue(value);
        }
    } else if (raw.parameters !== undefined && raw.parameters !== null) {
        warnings.push(`components[${index}] "${name}" parameters are not an object; ignored`);
    }

    const component: Component = { name, type, parameters };

    if (raw.position !== undefined && raw.position !== null) {
        const position = toPosition(raw.position);
        if (position) {
            component.position = position;
        } else {
            warnings.push(`components[${index}] "${name}" position is not four numbers; using grid layout`);
        }
    }

    return component;
}

function toConnection(raw: unknown): Connection {
    if (!isRecord(raw)) {
        return { source: '', destination: '' };
    }
    const connection: Connection = {
        source: typeof raw.source === 'string' ? raw.source : '',
        destination: typeof raw.destination === 'string' ? raw.destination : '',
    };
    const label = scalarToString(raw.label);
    if (label !== undefined && label.trim() !== '') {
        connection.label = label;
    }
    return connection;
}

/**
 * Convert a validated record into the typed graph. Lenient: bad values are
 * coerced or dropped and reported as warnings, never thrown.
 */
export function toArchitectureGraph(record: ArchitectureRecord): NormalizedGraph {
    const warnings: string[] = [];

    const rawName = record.system_name !== undefined ? record.system_name : record.systemName;
    let systemName = scalarToString(rawName) ?? '';
    if (systemName.trim() === '') {
        warnings.push(`System name is empty or not text; using "${DEFAULT_SYSTEM_NAME}"`);
        systemName = DEFAULT_SYSTEM_NAME;
    }

    const components: Component[] = [];
    record.components.forEach((raw: unknown, index: number) => {
        // validateArchitecture guarantees records here; guard for direct callers
        if (isRecord(raw)) components.push(toComponent(raw, index, warnings));
    });

    const connections: Connection[] = Array.isArray(record.connections)
        ? record.connections.map((raw: unknown) => toConnection(raw))
        : [];

    return { graph: { systemName, components, connections }, warnings };
}
