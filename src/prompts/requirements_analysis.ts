/**
 * Natural-language requirements → block architecture
 */

export function getRequirementsAnalysisPrompt(): string {
    return `You are a Senior Model-Based Design (MBD) Architect.
Task: Analyze the system requirements below and design a Simulink/Stateflow architecture that satisfies them.

MAPPING RULES:
1. Each functional responsibility ("the system shall control ...") becomes a "Subsystem".
2. Measured or commanded quantities entering the system become an "Inport"; quantities it produces become an "Outport".
3. Scaling, combining and multiplying quantities use "Gain", "Sum" and "Product".
4. Mode or condition statements ("when", "if", "in state") become a "Switch" or a "StateflowChart".
5. Quantities accumulated over time become an "Integrator"; stated limits become a "Saturation".
6. Fixed setpoints become a "Constant"; monitoring requirements become a "Scope".

The architecture MUST contain between 4 and 8 components.`;
}
