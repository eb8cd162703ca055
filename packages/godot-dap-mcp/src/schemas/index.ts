export interface JsonSchemaProperty {
  type?: 'string' | 'number' | 'integer' | 'boolean' | 'object' | 'array';
  description: string;
  default?: unknown;
  minimum?: number;
  maximum?: number;
}

// A type alias, so it fits the SDK's open `inputSchema` object type.
export type ToolInputSchema = {
  type: 'object';
  properties: Record<string, JsonSchemaProperty>;
  required?: string[];
};

const threadIdProperty: JsonSchemaProperty = {
  type: 'integer',
  description: 'Thread to act on. Godot runs scripts on thread 1.',
  default: 1,
  minimum: 0,
};

const projectProperty: JsonSchemaProperty = {
  type: 'string',
  description:
    'Absolute path to the Godot project directory (must contain project.godot). Defaults to the project given to godot_connect.',
};

const launchOptionProperties: Record<string, JsonSchemaProperty> = {
  project: projectProperty,
  no_debug: {
    type: 'boolean',
    description: 'Run without the debugger; breakpoints are ignored.',
    default: false,
  },
  profiling: {
    type: 'boolean',
    description: 'Enable the profiler.',
    default: false,
  },
  debug_collisions: {
    type: 'boolean',
    description: 'Draw collision shapes.',
    default: false,
  },
  debug_paths: {
    type: 'boolean',
    description: 'Draw navigation paths.',
    default: false,
  },
  debug_navigation: {
    type: 'boolean',
    description: 'Draw navigation meshes.',
    default: false,
  },
  additional_options: {
    type: 'string',
    description: 'Extra command-line options passed to the game.',
  },
};

export const pingSchema: ToolInputSchema = {
  type: 'object',
  properties: {
    message: {
      type: 'string',
      description: 'Text to echo back.',
      default: 'pong',
    },
  },
};

export const connectSchema: ToolInputSchema = {
  type: 'object',
  properties: {
    port: {
      type: 'integer',
      description:
        'Port of the Godot editor debug adapter. Defaults to the server setting (6006 unless --port was given).',
      minimum: 1,
      maximum: 65535,
    },
    host: {
      type: 'string',
      description: 'Host of the Godot editor. Defaults to the server setting.',
    },
    project: {
      type: 'string',
      description:
        'Absolute path to the Godot project directory. Needed to resolve res:// paths.',
    },
  },
};

export const disconnectSchema: ToolInputSchema = {
  type: 'object',
  properties: {
    terminate_debuggee: {
      type: 'boolean',
      description: 'Also stop the running game.',
      default: false,
    },
  },
};

export const getSessionStateSchema: ToolInputSchema = {
  type: 'object',
  properties: {},
};

export const launchMainSceneSchema: ToolInputSchema = {
  type: 'object',
  properties: launchOptionProperties,
};

export const launchSceneSchema: ToolInputSchema = {
  type: 'object',
  required: ['scene'],
  properties: {
    ...launchOptionProperties,
    scene: {
      type: 'string',
      description: 'Resource path of the scene, e.g. "res://scenes/level_1.tscn".',
    },
  },
};

export const launchCurrentSceneSchema: ToolInputSchema = {
  type: 'object',
  properties: launchOptionProperties,
};

export const attachSchema: ToolInputSchema = {
  type: 'object',
  properties: {
    project: projectProperty,
  },
};

export const setBreakpointSchema: ToolInputSchema = {
  type: 'object',
  required: ['file', 'line'],
  properties: {
    file: {
      type: 'string',
      description: 'Script path, absolute or "res://...".',
    },
    line: {
      type: 'integer',
      description: 'Line number (1-based).',
      minimum: 1,
    },
  },
};

export const clearBreakpointSchema: ToolInputSchema = {
  type: 'object',
  required: ['file'],
  properties: {
    file: {
      type: 'string',
      description: 'Script path, absolute or "res://...". All its breakpoints are removed.',
    },
  },
};

export const threadSchema: ToolInputSchema = {
  type: 'object',
  properties: {
    thread_id: threadIdProperty,
  },
};

export const getThreadsSchema: ToolInputSchema = {
  type: 'object',
  properties: {},
};

export const getStackTraceSchema: ToolInputSchema = {
  type: 'object',
  properties: {
    thread_id: threadIdProperty,
    max_frames: {
      type: 'integer',
      description: 'Maximum number of frames to return.',
      default: 20,
      minimum: 1,
    },
  },
};

export const getScopesSchema: ToolInputSchema = {
  type: 'object',
  required: ['frame_id'],
  properties: {
    frame_id: {
      type: 'integer',
      description: 'Frame id from godot_get_stack_trace.',
      minimum: 0,
    },
  },
};

export const getVariablesSchema: ToolInputSchema = {
  type: 'object',
  required: ['variables_reference'],
  properties: {
    variables_reference: {
      type: 'integer',
      description: 'Reference from godot_get_scopes or an expandable variable.',
      minimum: 1,
    },
  },
};

export const evaluateSchema: ToolInputSchema = {
  type: 'object',
  required: ['expression'],
  properties: {
    expression: {
      type: 'string',
      description: 'GDScript expression to evaluate.',
    },
    frame_id: {
      type: 'integer',
      description: 'Frame to evaluate in (0 = top frame).',
      default: 0,
      minimum: 0,
    },
    context: {
      type: 'string',
      description: 'DAP evaluation context: "repl", "watch" or "hover".',
      default: 'repl',
    },
  },
};

export const setVariableSchema: ToolInputSchema = {
  type: 'object',
  required: ['variable_name', 'value'],
  properties: {
    variable_name: {
      type: 'string',
      description: 'Name of the variable (a GDScript identifier).',
    },
    // Any JSON value is accepted, so no `type`.
    value: {
      description: 'New value for the variable.',
    },
    frame_id: {
      type: 'integer',
      description: 'Frame the variable lives in (0 = top frame).',
      default: 0,
      minimum: 0,
    },
  },
};
