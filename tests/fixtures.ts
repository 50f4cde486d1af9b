import { ArchitectureGraph } from '../src/graph_types';

/** Three-block speed controller used across renderer and pipeline tests. */
export function speedControlGraph(): ArchitectureGraph {
    return {
        systemName: 'Speed_Control',
        components: [
            { name: 'SpeedIn', type: { kind: 'Inport' }, parameters: {} },
            { name: 'SpeedGain', type: { kind: 'Gain' }, parameters: { Gain: '2.0' } },
            { name: 'SpeedOut', type: { kind: 'Outport' }, parameters: {} },
        ],
        connections: [
            { source: 'SpeedIn/1', destination: 'SpeedGain/1', label: 'speed_meas' },
            { source: 'SpeedGain/1', destination: 'SpeedOut/1' },
        ],
    };
}

export const SPEED_CONTROL_REPLY = JSON.stringify({
    system_name: 'Speed_Control',
    components: [
        { name: 'SpeedIn', type: 'Inport' },
        { name: 'SpeedGain', type: 'Gain', parameters: { Gain: '2.0' } },
        { name: 'SpeedOut', type: 'Outport' },
    ],
    connections: [
        { source: 'SpeedIn/1', destination: 'SpeedGain/1', label: 'speed_meas' },
        { source: 'SpeedGain/1', destination: 'SpeedOut/1' },
    ],
});
