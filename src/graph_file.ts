/**
 * Exported graph file: UTF-8, pretty-printed JSON in the same wire shape the
 * oracle is asked to produce, so loading it goes through the same validator.
 */

import * as fs from 'fs';
import { ArchitectureGraph, componentTypeName } from './graph_types';

export interface WireComponent {
    name: string;
    type: string;
    parameters?: Record<string, string>;
    position?: number[];
}

export interface WireConnection {
    source: string;
    destination: string;
    label?: string;
}

export interface WireGraph {
    system_name: string;
    components: WireComponent[];
    connections: WireConnection[];
}

export function toWireGraph(graph: ArchitectureGraph): WireGraph {
    return {
        system_name: graph.systemName,
        components: graph.components.map((c) => {
            const wire: WireComponent = { name: c.name, type: componentTypeName(c.type) };
            if (Object.keys(c.parameters).length > 0) wire.parameters = { ...c.parameters };
            if (c.position) wire.position = [...c.position];
            return wire;
        }),
        connections: graph.connections.map((c) => {
            const wire: WireConnection = { source: c.source, destination: c.destination };
            if (c.label !== undefined) wire.label = c.label;
            return wire;
        }),
    };
}

export function serializeGraph(graph: ArchitectureGraph): string {
    return JSON.stringify(toWireGraph(graph), null, 2) + '\n';
}

export type GraphFileResult =
    | { ok: true; value: unknown }
    | { ok: false; reason: string };

/** Parse exported file text; structural checks are left to the validator. */
export function parseGraphFile(text: string): GraphFileResult {
    try {
        return { ok: true, value: JSON.parse(text.replace(/^\uFEFF/, '')) };
    } catch (e) {
        return { ok: false, reason: `Invalid JSON file: ${e instanceof Error ? e.message : String(e)}` };
    }
}

export function readGraphFile(filePath: string): GraphFileResult {
    let text: string;
    try {
        text = fs.readFileSync(filePath, 'utf-8');
    } catch (e) {
        return { ok: false, reason: `Cannot read ${filePath}: ${e instanceof Error ? e.message : String(e)}` };
    }
    return parseGraphFile(text);
}
