/**
 * Output schema and worked example shared by every analysis prompt.
 */

import { COMPONENT_KINDS } from '../graph_types';

export function getSchemaSection(): string {
    return `OUTPUT FORMAT:
You must ONLY output a valid JSON object. No markdown formatting, no prose, no comments.

JSON SCHEMA:
{
  "system_name": "String (top level model name, letters/digits/underscores, no spaces)",
  "components": [
    {
      "name": "String (unique block name)",
      "type": "String (one of: ${COMPONENT_KINDS.join(', ')})",
      "parameters": { "Key": "Value" },
      "position": [left, top, right, bottom]
    }
  ],
  "connections": [
    { "source": "BlockName/1", "destination": "BlockName/1", "label": "optional signal name" }
  ]
}

"parameters", "position" and "label" are optional. Positions must not overlap.`;
}

export function getWorkedExample(): string {
    return `EXAMPLE:
Input: "The controller shall scale the measured speed by a constant gain and output the result."
Output:
{
  "system_name": "Speed_Control",
  "components": [
    { "name": "SpeedIn", "type": "Inport" },
    { "name": "SpeedGain", "type": "Gain", "parameters": { "Gain": "2.0" } },
    { "name": "SpeedOut", "type": "Outport" }
  ],
  "connections": [
    { "source": "SpeedIn/1", "destination": "SpeedGain/1", "label": "speed_meas" },
    { "source": "SpeedGain/1", "destination": "SpeedOut/1" }
  ]
}`;
}
