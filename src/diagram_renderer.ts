/**
 * Mermaid diagram renderer.
 *
 * Output is always a complete `graph LR` document. Bad elements are skipped
 * or replaced by placeholder nodes and reported as warnings; nothing throws.
 */

import { ArchitectureGraph, Component, ComponentType, KnownComponentKind } from './graph_types';
import { ID_NAMESPACE, sanitizeIdentifier, sanitizeLabel } from './identifier_sanitizer';

export const DIAGRAM_HEADER = 'graph LR';
export const EMPTY_PLACEHOLDER = `${ID_NAMESPACE}empty["No components"]`;

const INDENT = '    ';

export interface NodeShape {
    open: string;
    close: string;
}

const SHAPES: Record<KnownComponentKind | 'Other', NodeShape> = {
    Inport: { open: '([', close: '])' },
    Outport: { open: '>', close: ']' },
    Gain: { open: '[/', close: '\\]' },
    Sum: { open: '((', close: '))' },
    Integrator: { open: '[\\', close: '/]' },
    Subsystem: { open: '[', close: ']' },
    StateflowChart: { open: '{', close: '}' },
    ModelReference: { open: '[[', close: ']]' },
    Constant: { open: '[/', close: '/]' },
    Scope: { open: '[(', close: ')]' },
    Product: { open: '(((', close: ')))' },
    Switch: { open: '{{', close: '}}' },
    Saturation: { open: '[\\', close: '\\]' },
    Other: { open: '[', close: ']' },
};

/** Container-like kinds get their type appended to the label. */
const CONTAINER_TAGS: Partial<Record<KnownComponentKind, string>> = {
    Subsystem: 'Subsystem',
    ModelReference: 'ModelRef',
    StateflowChart: 'Stateflow',
};

export interface DiagramReport {
    text: string;
    warnings: string[];
}

export function nodeShape(type: ComponentType): NodeShape {
    return SHAPES[type.kind];
}

function nodeLabel(component: Component): string {
    const label = sanitizeLabel(component.name);
    const tag = component.type.kind === 'Other' ? undefined : CONTAINER_TAGS[component.type.kind];
    return tag ? `${label}<br/>${tag}` : label;
}

function uniqueId(base: string, index: number, used: Set<string>): string {
    if (!used.has(base)) return base;
    let candidate = `${base}_${index}`;
    let n = 2;
    while (used.has(candidate)) {
        candidate = `${base}_${index}_${n++}`;
    }
    return candidate;
}

function baseName(endpoint: string): string {
    return endpoint.split('/')[0].trim();
}

function errorMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}

export function renderDiagramReport(graph: ArchitectureGraph): DiagramReport {
    const lines: string[] = [DIAGRAM_HEADER];
    const warnings: string[] = [];
    const used = new Set<string>();
    // node id per component index; undefined where the component failed
    const nodeIds: Array<string | undefined> = [];
    // sanitized component name -> node id of its first drawn occurrence
    const byName = new Map<string, string>();

    const components = Array.isArray(graph.components) ? graph.components : [];
    const connections = Array.isArray(graph.connections) ? graph.connections : [];

    components.forEach((component, index) => {
        try {
            const base = sanitizeIdentifier(component.name);
            const id = uniqueId(base, index, used);
            const shape = nodeShape(component.type);
            const line = `${INDENT}${id}${shape.open}"${nodeLabel(component)}"${shape.close}`;
            used.add(id);
            if (!byName.has(base)) byName.set(base, id);
            nodeIds[index] = id;
            lines.push(line);
        } catch (e) {
            const id = uniqueId(`${ID_NAMESPACE}error_${index}`, index, used);
            used.add(id);
            nodeIds[index] = undefined;
            lines.push(`${INDENT}${id}["Invalid component ${index + 1}"]`);
            warnings.push(`components[${index}] could not be drawn: ${errorMessage(e)}`);
        }
    });

    if (used.size === 0) {
        lines.push(`${INDENT}${EMPTY_PLACEHOLDER}`);
    }

    const resolve = (endpoint: string): string | undefined => {
        const base = baseName(endpoint);
        if (base === '') return undefined;
        const id = byName.get(sanitizeIdentifier(base));
        if (id !== undefined) return id;
        const match = components.findIndex((c) => c.name.trim() === base);
        return match === -1 ? undefined : nodeIds[match];
    };

    connections.forEach((connection, index) => {
        try {
            const source = typeof connection.source === 'string' ? connection.source : '';
            const destination = typeof connection.destination === 'string' ? connection.destination : '';
            const src = resolve(source);
            const dst = resolve(destination);
            if (!src || !dst) {
                const missing = !src ? `source "${source}"` : `destination "${destination}"`;
                warnings.push(`connections[${index}] omitted from diagram: unknown ${missing}`);
                return;
            }
            if (connection.label) {
                const label = sanitizeLabel(connection.label).replace(/\|/g, '/');
                lines.push(`${INDENT}${src} -->|"${label}"| ${dst}`);
            } else {
                lines.push(`${INDENT}${src} --> ${dst}`);
            }
        } catch (e) {
            warnings.push(`connections[${index}] could not be drawn: ${errorMessage(e)}`);
        }
    });

    return { text: lines.join('\n'), warnings };
}

export function renderDiagram(graph: ArchitectureGraph): string {
    return renderDiagramReport(graph).text;
}
