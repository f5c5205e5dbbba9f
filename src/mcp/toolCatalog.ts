import type { Tool } from '@modelcontextprotocol/sdk/types.js';

import {
  BEEP_DEFAULT_INTENSITY,
  DURATION_MAX_MS,
  DURATION_MIN_MS,
  INTENSITY_MAX,
  INTENSITY_MIN,
  TOOL_NAMES,
  type ToolName
} from '../openshock/commands.js';

function idProperty() {
  return {
    type: 'string',
    minLength: 1,
    description: 'Shocker ID'
  };
}

function durationProperty() {
  return {
    type: 'integer',
    minimum: DURATION_MIN_MS,
    maximum: DURATION_MAX_MS,
    description: `Duration in milliseconds (${DURATION_MIN_MS}-${DURATION_MAX_MS})`
  };
}

function intensityProperty(label: string, maximum: number, extra: Record<string, unknown> = {}) {
  return {
    type: 'integer',
    minimum: INTENSITY_MIN,
    maximum,
    description: `${label} intensity (${INTENSITY_MIN}-${maximum})`,
    ...extra
  };
}

function shockersSchema(
  description: string,
  itemProperties: Record<string, object>,
  required: string[]
): Tool['inputSchema'] {
  return {
    type: 'object',
    properties: {
      shockers: {
        type: 'array',
        description,
        items: {
          type: 'object',
          properties: itemProperties,
          required
        }
      }
    },
    required: ['shockers']
  };
}

function describeTool(name: ToolName, ceiling: number): Tool {
  switch (name) {
    case 'SHOCK':
      return {
        name,
        description: `Send shock command to OpenShock devices (max intensity ${ceiling})`,
        inputSchema: shockersSchema(
          'List of shockers to control',
          {
            id: idProperty(),
            intensity: intensityProperty('Shock', ceiling),
            duration: durationProperty()
          },
          ['id', 'intensity', 'duration']
        )
      };
    case 'VIBRATE':
      return {
        name,
        description: 'Send vibrate command to OpenShock devices',
        inputSchema: shockersSchema(
          'List of shockers to control',
          {
            id: idProperty(),
            intensity: intensityProperty('Vibration', INTENSITY_MAX),
            duration: durationProperty()
          },
          ['id', 'intensity', 'duration']
        )
      };
    case 'BEEP':
      return {
        name,
        description: 'Send beep/sound command to OpenShock devices',
        inputSchema: shockersSchema(
          'List of shockers to control',
          {
            id: idProperty(),
            intensity: intensityProperty('Beep', INTENSITY_MAX, { default: BEEP_DEFAULT_INTENSITY }),
            duration: durationProperty()
          },
          ['id', 'duration']
        )
      };
    case 'STOP':
      return {
        name,
        description: 'Stop all commands on OpenShock devices',
        inputSchema: shockersSchema('List of shocker IDs to stop', { id: idProperty() }, ['id'])
      };
  }
}

/** Tool descriptors in the order SHOCK, VIBRATE, BEEP, STOP, built for the given SHOCK ceiling. */
export function listTools(ceiling: number): Tool[] {
  return TOOL_NAMES.map((name) => describeTool(name, ceiling));
}
