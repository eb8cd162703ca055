// Argument validators for the MCP tools. Defaults are applied here, so the
// handlers receive complete argument objects.
import { z } from 'zod';

const threadId = z.number().int().nonnegative().default(1);

export const pingArgs = z.object({
  message: z.string().default('pong'),
});

export const connectArgs = z.object({
  port: z.number().int().min(1).max(65535).optional(),
  host: z.string().min(1).optional(),
  project: z.string().min(1).optional(),
});

export const disconnectArgs = z.object({
  terminate_debuggee: z.boolean().default(false),
});

export const getSessionStateArgs = z.object({});

const launchOptions = {
  project: z.string().min(1).optional(),
  no_debug: z.boolean().default(false),
  profiling: z.boolean().default(false),
  debug_collisions: z.boolean().default(false),
  debug_paths: z.boolean().default(false),
  debug_navigation: z.boolean().default(false),
  additional_options: z.string().optional(),
};

export const launchMainSceneArgs = z.object(launchOptions);

export const launchSceneArgs = z.object({
  ...launchOptions,
  scene: z.string().min(1),
});

export const launchCurrentSceneArgs = z.object(launchOptions);

export const attachArgs = z.object({
  project: z.string().min(1).optional(),
});

export const setBreakpointArgs = z.object({
  file: z.string().min(1),
  line: z.number().int().positive(),
});

export const clearBreakpointArgs = z.object({
  file: z.string().min(1),
});

export const threadArgs = z.object({
  thread_id: threadId,
});

export const getThreadsArgs = z.object({});

export const getStackTraceArgs = z.object({
  thread_id: threadId,
  max_frames: z.number().int().positive().default(20),
});

export const getScopesArgs = z.object({
  frame_id: z.number().int().nonnegative(),
});

export const getVariablesArgs = z.object({
  variables_reference: z.number().int().positive(),
});

export const evaluateArgs = z.object({
  expression: z.string().min(1),
  frame_id: z.number().int().nonnegative().default(0),
  context: z.string().default('repl'),
});

export const setVariableArgs = z.object({
  variable_name: z.string().min(1),
  value: z.unknown().refine((value) => value !== undefined, {
    message: 'Required',
  }),
  frame_id: z.number().int().nonnegative().default(0),
});

export type PingArgs = z.infer<typeof pingArgs>;
export type ConnectArgs = z.infer<typeof connectArgs>;
export type DisconnectArgs = z.infer<typeof disconnectArgs>;
export type GetSessionStateArgs = z.infer<typeof getSessionStateArgs>;
export type LaunchOptionsArgs = z.infer<typeof launchMainSceneArgs>;
export type LaunchSceneArgs = z.infer<typeof launchSceneArgs>;
export type AttachArgs = z.infer<typeof attachArgs>;
export type SetBreakpointArgs = z.infer<typeof setBreakpointArgs>;
export type ClearBreakpointArgs = z.infer<typeof clearBreakpointArgs>;
export type ThreadArgs = z.infer<typeof threadArgs>;
export type GetThreadsArgs = z.infer<typeof getThreadsArgs>;
export type GetStackTraceArgs = z.infer<typeof getStackTraceArgs>;
export type GetScopesArgs = z.infer<typeof getScopesArgs>;
export type GetVariablesArgs = z.infer<typeof getVariablesArgs>;
export type EvaluateArgs = z.infer<typeof evaluateArgs>;
export type SetVariableArgs = z.infer<typeof setVariableArgs>;
