/**
 * Architecture graph model.
 *
 * Component kinds form a closed set; anything the oracle invents is carried
 * as `Other` with its raw type string so renderers can fall back to a box.
 */

export const COMPONENT_KINDS = [
    'Inport',
    'Outport',
    'Gain',
    'Sum',
    'Integrator',
    'Subsystem',
    'StateflowChart',
    'ModelReference',
    'Constant',
    'Scope',
    'Product',
    'Switch',
    'Saturation',
] as const;

export type KnownComponentKind = (typeof COMPONENT_KINDS)[number];

export type ComponentType =
    | { kind: KnownComponentKind }
    | { kind: 'Other'; rawType: string };

/** [left, top, right, bottom] in model canvas coordinates */
export type BlockPosition = [number, number, number, number];

export interface Component {
    name: string;
    type: ComponentType;
    parameters: Record<string, string>;
    position?: BlockPosition;
}

export interface Connection {
    /** "ComponentName/PortNumber" */
    source: string;
    destination: string;
    label?: string;
}

export interface ArchitectureGraph {
    systemName: string;
    components: Component[];
    connections: Connection[];
}

export type InputKind = 'CODE' | 'REQUIREMENTS';

export function isKnownComponentKind(value: string): value is KnownComponentKind {
    return (COMPONENT_KINDS as readonly string[]).includes(value);
}

export function parseComponentType(raw: string): ComponentType {
    const trimmed = raw.trim();
    return isKnownComponentKind(trimmed) ? { kind: trimmed } : { kind: 'Other', rawType: raw };
}

/** Type string as written in the exported file. */
export function componentTypeName(type: ComponentType): string {
    return type.kind === 'Other' ? type.rawType : type.kind;
}
