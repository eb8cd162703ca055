import {
  CancellationError,
  CancellationToken,
  ConnectionClosedError,
  DebugProtocol,
  DebugSession,
  LaunchArguments,
  LoggerInterface,
  SessionState,
  SourceBreakpoints,
  StateError,
  TimeoutError,
  UnsupportedCommandError,
} from 'dap-session-client';
import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { McpAsyncEvent } from '../types/mcp_protocol_extensions';
import {
  AttachArgs,
  ClearBreakpointArgs,
  ConnectArgs,
  DisconnectArgs,
  EvaluateArgs,
  GetScopesArgs,
  GetSessionStateArgs,
  GetStackTraceArgs,
  GetThreadsArgs,
  GetVariablesArgs,
  LaunchOptionsArgs,
  LaunchSceneArgs,
  PingArgs,
  SetBreakpointArgs,
  SetVariableArgs,
  ThreadArgs,
} from '../types/toolArgs';
import {
  HandleClearBreakpointResult,
  HandleConnectResult,
  HandleDisconnectResult,
  HandleEvaluateResult,
  HandleExecutionResult,
  HandleGetScopesResult,
  HandleGetSessionStateResult,
  HandleGetStackTraceResult,
  HandleGetThreadsResult,
  HandleGetVariablesResult,
  HandleLaunchResult,
  HandlePingResult,
  HandleSetBreakpointResult,
} from '../types/toolResults';
import { ModelBreakpoint, ModelSourceBreakpoints } from '../types';
import {
  McpErrorBuilder,
  TOOL_EXECUTION_ERROR,
  ToolProblemError,
} from '../errorUtils';
import { BreakpointPlanRegistry } from '../breakpointPlan';
import { formatGodotValue, formatVariableList } from '../formatting';
import { resolveGodotPath, validateProjectPath } from '../paths';
import type { ServerConfig } from '../config';

export interface SessionProvider {
  getLogger(): LoggerInterface;
  getConfig(): ServerConfig;
  /** The live session, if any. There is at most one. */
  getSession(): DebugSession | undefined;
  /** Creates a session with the async event listeners attached. It is not made active. */
  openSession(projectRoot?: string): DebugSession;
  setActiveSession(session: DebugSession | undefined): void;
  getBreakpointPlan(): BreakpointPlanRegistry;
  drainAsyncEventQueue(): McpAsyncEvent[];
  /** The godot_connect under way, if any. */
  getPendingConnect(): Promise<HandleConnectResult> | undefined;
  setPendingConnect(connect: Promise<HandleConnectResult> | undefined): void;
}

const GDSCRIPT_IDENTIFIER = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

const STATE_HINTS: Readonly<Record<SessionState, string>> = {
  disconnected: 'Call godot_connect first',
  connected:
    'The handshake did not finish; call godot_disconnect, then godot_connect again',
  initialized:
    'Start the game with godot_launch_main_scene, godot_launch_scene, godot_launch_current_scene or godot_attach',
  configuring: 'Wait for the launch to finish',
  running: 'The game is running; call godot_pause or wait for a breakpoint',
  paused: 'The game is paused; call godot_continue or a step tool',
  terminated:
    'The game has exited; call godot_disconnect, then godot_connect to start over',
};

// HELPER FUNCTIONS START

/** Rewrites a state violation into text that tells the caller what to do next. */
export function explainStateError(error: StateError): ToolProblemError {
  return new ToolProblemError(
    `"${error.command}" is not allowed while the session is ${error.state}`,
    {
      context: `allowed in: ${error.allowedStates.join(', ')}`,
      suggestions: [STATE_HINTS[error.state]],
      cause: error,
    },
  );
}

export function invalidArgument(
  sessionProvider: SessionProvider,
  toolName: string,
  argumentName: string,
  detail: string,
  receivedPath?: string,
): Error {
  return new McpErrorBuilder()
    .error(new Error(detail))
    .toolName(toolName)
    .mcpErrorCode(ErrorCode.InvalidParams)
    .mcpDebugErrorType('invalid_tool_arguments')
    .sessionProvider(sessionProvider)
    .additionalDebugData({
      argumentName,
      receivedPath,
      problemDetail: `Missing or invalid parameter '${argumentName}' for tool ${toolName}: ${detail}`,
    })
    .build();
}

function getActiveSessionOrThrow(
  sessionProvider: SessionProvider,
  toolName: string,
): DebugSession {
  const session = sessionProvider.getSession();
  if (!session || session.getState() === 'disconnected') {
    throw new McpErrorBuilder()
      .error(new Error('No active DAP session'))
      .toolName(toolName)
      .mcpErrorCode(TOOL_EXECUTION_ERROR)
      .mcpDebugErrorType('not_connected')
      .sessionProvider(sessionProvider)
      .build();
  }
  return session;
}

function resolveFileArgument(
  sessionProvider: SessionProvider,
  session: DebugSession,
  toolName: string,
  file: string,
): string {
  try {
    return resolveGodotPath(file, session.projectRoot);
  } catch (error) {
    throw invalidArgument(
      sessionProvider,
      toolName,
      'file',
      error instanceof Error ? error.message : String(error),
      file,
    );
  }
}

function toModelBreakpoint(bp: DebugProtocol.Breakpoint): ModelBreakpoint {
  return {
    id: bp.id,
    verified: bp.verified,
    line: bp.line,
    message: bp.message,
  };
}

function toModelSourceBreakpoints(
  results: SourceBreakpoints[],
): ModelSourceBreakpoints[] {
  return results.map((result) => ({
    file: result.path,
    breakpoints: result.breakpoints.map(toModelBreakpoint),
  }));
}

async function disconnectQuietly(
  session: DebugSession,
  logger: LoggerInterface,
): Promise<void> {
  if (session.getState() === 'disconnected') {
    return;
  }
  try {
    await session.disconnect();
  } catch (error) {
    logger.warn(
      `Disconnect after failed connect did not complete: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}

async function resolveProject(
  session: DebugSession,
  project: string | undefined,
): Promise<string> {
  const candidate = project ?? session.projectRoot;
  if (!candidate) {
    throw new ToolProblemError('No Godot project given', {
      suggestions: [
        "Pass 'project' to this tool",
        "Or pass 'project' to godot_connect",
      ],
      errorType: 'invalid_project',
    });
  }
  const validated = await validateProjectPath(candidate);
  session.projectRoot = validated;
  return validated;
}

/** DAP `launch` arguments understood by the Godot editor. */
export function buildLaunchArguments(
  project: string,
  scene: string,
  options: LaunchOptionsArgs,
): LaunchArguments {
  const args: LaunchArguments = {
    project,
    scene,
    platform: 'host',
    noDebug: options.no_debug,
    profiling: options.profiling,
    debug_collisions: options.debug_collisions,
    debug_paths: options.debug_paths,
    debug_navigation: options.debug_navigation,
  };
  if (options.additional_options) {
    args.additional_options = options.additional_options;
  }
  return args;
}

/**
 * Runs one debugger command and turns its failure into remediation text.
 * State violations pass through; the tool layer explains those.
 */
async function runCommand<T>(
  session: DebugSession,
  what: string,
  suggestions: readonly string[],
  command: () => Promise<T>,
): Promise<T> {
  try {
    return await command();
  } catch (error) {
    if (error instanceof StateError) {
      throw error;
    }
    throw commandFailure(session, what, suggestions, error);
  }
}

function commandFailure(
  session: DebugSession,
  what: string,
  suggestions: readonly string[],
  error: unknown,
): ToolProblemError {
  if (error instanceof TimeoutError) {
    return new ToolProblemError(`${what} was not answered in time`, {
      context: `session state: ${session.getState()}`,
      suggestions: [
        ...suggestions,
        'If the Godot editor stopped responding, call godot_disconnect, then godot_connect',
      ],
      cause: error,
    });
  }
  if (error instanceof ConnectionClosedError) {
    return new ToolProblemError(`${what} failed: the connection to the Godot editor closed`, {
      suggestions: ['Call godot_connect, then a launch tool to start over'],
      cause: error,
    });
  }
  if (error instanceof CancellationError) {
    return new ToolProblemError(`${what} was cancelled`, { cause: error });
  }
  return new ToolProblemError(`${what} failed`, {
    context: `session state: ${session.getState()}`,
    suggestions,
    cause: error,
  });
}

function handshakeFailure(what: string, error: unknown): Error {
  if (error instanceof StateError) {
    return explainStateError(error);
  }
  return new ToolProblemError(`Failed to ${what}`, {
    suggestions: [
      'Check the Output panel of the Godot editor for errors',
      'Call godot_disconnect, then godot_connect and try again',
    ],
    cause: error,
  });
}

// HELPER FUNCTIONS END

export async function handlePing(
  _sessionProvider: SessionProvider,
  args: PingArgs,
): Promise<HandlePingResult> {
  return {
    status: 'ok',
    message: args.message,
    timestamp: new Date().toISOString(),
  };
}

/**
 * Opens the one session. A call made while another connect is under way
 * waits for it, then answers as if it had come afterwards.
 */
export async function handleConnect(
  sessionProvider: SessionProvider,
  args: ConnectArgs,
  token?: CancellationToken,
): Promise<HandleConnectResult> {
  const pending = sessionProvider.getPendingConnect();
  if (pending) {
    await pending.then(
      () => undefined,
      () => undefined,
    );
    return handleConnect(sessionProvider, args, token);
  }

  const existing = sessionProvider.getSession();
  if (existing && existing.getState() !== 'disconnected') {
    return {
      status: 'already_connected',
      message: 'Already connected to Godot DAP server',
      state: existing.getState(),
      session_id: existing.client.sessionId,
      project: existing.projectRoot,
    };
  }

  const attempt = establishSession(sessionProvider, args, token);
  sessionProvider.setPendingConnect(attempt);
  try {
    return await attempt;
  } finally {
    if (sessionProvider.getPendingConnect() === attempt) {
      sessionProvider.setPendingConnect(undefined);
    }
  }
}

async function establishSession(
  sessionProvider: SessionProvider,
  args: ConnectArgs,
  token?: CancellationToken,
): Promise<HandleConnectResult> {
  const logger = sessionProvider.getLogger();
  const host = args.host ?? sessionProvider.getConfig().host;
  const port = args.port ?? sessionProvider.getConfig().port;
  const projectRoot = args.project
    ? await validateProjectPath(args.project)
    : undefined;
  // Active from the start, so disconnect and shutdown can reach it.
  const session = sessionProvider.openSession(projectRoot);
  sessionProvider.setActiveSession(session);
  const release = (): void => {
    if (sessionProvider.getSession() === session) {
      sessionProvider.setActiveSession(undefined);
    }
  };

  try {
    await session.connect(host, port);
  } catch (error) {
    release();
    throw new ToolProblemError('Failed to connect to Godot DAP server', {
      context: `${host}:${port}`,
      suggestions: [
        'Launch the Godot editor',
        'Enable the debug adapter in Editor Settings > Network > Debug Adapter',
        `Check the port setting (default: 6006, tried: ${port})`,
      ],
      cause: error,
    });
  }

  if (sessionProvider.getSession() !== session) {
    await disconnectQuietly(session, logger);
    throw new ToolProblemError('Connection attempt abandoned', {
      context: 'the session was closed while connecting',
      suggestions: ['Call godot_connect again'],
      errorType: 'connection_closed',
    });
  }

  try {
    await session.initialize({}, token);
  } catch (error) {
    release();
    await disconnectQuietly(session, logger);
    throw new ToolProblemError('Failed to initialize the DAP session', {
      context: `${host}:${port}`,
      suggestions: [
        'Make sure nothing else is attached to the Godot debug adapter',
        'Restart the Godot editor and call godot_connect again',
      ],
      cause: error,
    });
  }

  return {
    status: 'connected',
    message: `Connected to Godot DAP server at ${host}:${port}. Ready to launch.`,
    state: session.getState(),
    session_id: session.client.sessionId,
    project: projectRoot,
  };
}

export async function handleDisconnect(
  sessionProvider: SessionProvider,
  args: DisconnectArgs,
): Promise<HandleDisconnectResult> {
  const session = sessionProvider.getSession();
  sessionProvider.setActiveSession(undefined);
  if (!session || session.getState() === 'disconnected') {
    return {
      status: 'not_connected',
      message: 'Not currently connected to Godot DAP server',
    };
  }
  await session.disconnect(args.terminate_debuggee);
  return {
    status: 'disconnected',
    message: 'Disconnected from Godot DAP server',
  };
}

export async function handleGetSessionState(
  sessionProvider: SessionProvider,
  _args: GetSessionStateArgs,
): Promise<HandleGetSessionStateResult> {
  const plan = sessionProvider.getBreakpointPlan();
  const pending = plan
    .toPlans()
    .map((entry) => ({ file: entry.path, lines: entry.lines }));
  const session = sessionProvider.getSession();
  if (!session) {
    return {
      connected: false,
      state: 'disconnected',
      planned_breakpoint_count: plan.size,
      pending_breakpoints: pending,
    };
  }
  return {
    connected: session.getState() !== 'disconnected',
    state: session.getState(),
    session_id: session.client.sessionId,
    project: session.projectRoot,
    last_stop_reason: session.getLastStopReason(),
    capabilities: session.getCapabilities(),
    recorded_events: session.events.size,
    planned_breakpoint_count: plan.size,
    pending_breakpoints: pending,
  };
}

async function launch(
  sessionProvider: SessionProvider,
  toolName: string,
  args: LaunchOptionsArgs,
  scene: string,
  label: string,
  token?: CancellationToken,
): Promise<HandleLaunchResult> {
  const session = getActiveSessionOrThrow(sessionProvider, toolName);
  const project = await resolveProject(session, args.project);
  const launchArgs = buildLaunchArguments(project, scene, args);
  const plans = sessionProvider.getBreakpointPlan().toPlans();

  let result;
  try {
    result = await session.launchAndConfigure(launchArgs, plans, token);
  } catch (error) {
    throw handshakeFailure(`launch ${label}`, error);
  }
  return {
    status: 'launched',
    message: `${label.charAt(0).toUpperCase()}${label.slice(1)} launched`,
    project,
    scene,
    state: session.getState(),
    breakpoints: toModelSourceBreakpoints(result.breakpoints),
  };
}

export function handleLaunchMainScene(
  sessionProvider: SessionProvider,
  args: LaunchOptionsArgs,
  token?: CancellationToken,
): Promise<HandleLaunchResult> {
  return launch(
    sessionProvider,
    'godot_launch_main_scene',
    args,
    'main',
    'main scene',
    token,
  );
}

export function handleLaunchScene(
  sessionProvider: SessionProvider,
  args: LaunchSceneArgs,
  token?: CancellationToken,
): Promise<HandleLaunchResult> {
  if (!args.scene.startsWith('res://')) {
    throw invalidArgument(
      sessionProvider,
      'godot_launch_scene',
      'scene',
      `Scene must be a resource path starting with res:// (got: ${args.scene})`,
      args.scene,
    );
  }
  return launch(
    sessionProvider,
    'godot_launch_scene',
    args,
    args.scene,
    `scene ${args.scene}`,
    token,
  );
}

export function handleLaunchCurrentScene(
  sessionProvider: SessionProvider,
  args: LaunchOptionsArgs,
  token?: CancellationToken,
): Promise<HandleLaunchResult> {
  return launch(
    sessionProvider,
    'godot_launch_current_scene',
    args,
    'current',
    'current scene',
    token,
  );
}

export async function handleAttach(
  sessionProvider: SessionProvider,
  args: AttachArgs,
  token?: CancellationToken,
): Promise<HandleLaunchResult> {
  const session = getActiveSessionOrThrow(sessionProvider, 'godot_attach');
  const project = args.project
    ? await resolveProject(session, args.project)
    : session.projectRoot;
  const plans = sessionProvider.getBreakpointPlan().toPlans();

  let result;
  try {
    result = await session.attachAndConfigure({}, plans, token);
  } catch (error) {
    throw handshakeFailure('attach to the running game', error);
  }
  return {
    status: 'attached',
    message: 'Attached to the running game',
    project,
    state: session.getState(),
    breakpoints: toModelSourceBreakpoints(result.breakpoints),
  };
}

function breakpointStateProblem(error: StateError, kept: string): ToolProblemError {
  return new ToolProblemError(
    `Breakpoints can only be sent while a launch is being configured`,
    {
      context: `session state: ${error.state}`,
      suggestions: [
        kept,
        'Call godot_disconnect, then godot_connect and a launch tool to apply it now',
      ],
      cause: error,
    },
  );
}

export async function handleSetBreakpoint(
  sessionProvider: SessionProvider,
  args: SetBreakpointArgs,
  token?: CancellationToken,
): Promise<HandleSetBreakpointResult> {
  const toolName = 'godot_set_breakpoint';
  const session = getActiveSessionOrThrow(sessionProvider, toolName);
  const resolved = resolveFileArgument(sessionProvider, session, toolName, args.file);
  const plan = sessionProvider.getBreakpointPlan();
  plan.add(resolved, args.line);

  const state = session.getState();
  if (state === 'connected' || state === 'initialized') {
    return {
      status: 'pending',
      message: `Breakpoint recorded at ${args.file}:${args.line}; it is sent with the next launch or attach`,
      file: args.file,
      resolved_path: resolved,
      requested_line: args.line,
    };
  }

  const lines = plan.linesFor(resolved);
  let body;
  try {
    body = await session.client.setBreakpoints(resolved, lines, token);
  } catch (error) {
    if (error instanceof StateError) {
      throw breakpointStateProblem(
        error,
        'The breakpoint is recorded and will be sent with the next launch or attach',
      );
    }
    throw error;
  }

  // Answers come back in request order; the debugger may move a line.
  const index = lines.indexOf(args.line);
  const bp = index >= 0 ? body.breakpoints.at(index) : undefined;
  if (!bp) {
    throw new ToolProblemError('No breakpoint was set', {
      context: `${args.file}:${args.line}`,
      suggestions: [
        'Check that the file exists in the project',
        'Pick a line that holds an executable statement',
      ],
    });
  }
  if (!bp.verified) {
    return {
      status: 'unverified',
      message:
        'Breakpoint set but not verified; the file may not be loaded or the line may not be executable',
      file: args.file,
      resolved_path: resolved,
      requested_line: args.line,
      breakpoint: toModelBreakpoint(bp),
    };
  }
  const moved = bp.line !== undefined && bp.line !== args.line;
  return {
    status: moved ? 'adjusted' : 'verified',
    message: moved
      ? `Breakpoint set at ${args.file}:${bp.line} (requested line ${args.line})`
      : `Breakpoint set at ${args.file}:${args.line}`,
    file: args.file,
    resolved_path: resolved,
    requested_line: args.line,
    breakpoint: toModelBreakpoint(bp),
  };
}

export async function handleClearBreakpoint(
  sessionProvider: SessionProvider,
  args: ClearBreakpointArgs,
  token?: CancellationToken,
): Promise<HandleClearBreakpointResult> {
  const toolName = 'godot_clear_breakpoint';
  const session = getActiveSessionOrThrow(sessionProvider, toolName);
  const resolved = resolveFileArgument(sessionProvider, session, toolName, args.file);
  const hadPlan = sessionProvider.getBreakpointPlan().clear(resolved);

  const state = session.getState();
  if (state === 'connected' || state === 'initialized') {
    return {
      status: 'cleared',
      message: hadPlan
        ? `All planned breakpoints cleared in ${args.file}`
        : `No breakpoints were planned in ${args.file}`,
      file: args.file,
      resolved_path: resolved,
      sent: false,
    };
  }

  try {
    await session.client.setBreakpoints(resolved, [], token);
  } catch (error) {
    if (error instanceof StateError) {
      throw breakpointStateProblem(
        error,
        'The breakpoints are removed from the plan; the running game keeps them until it is relaunched',
      );
    }
    throw error;
  }
  return {
    status: 'cleared',
    message: `All breakpoints cleared in ${args.file}`,
    file: args.file,
    resolved_path: resolved,
    sent: true,
  };
}

export async function handleContinue(
  sessionProvider: SessionProvider,
  args: ThreadArgs,
  token?: CancellationToken,
): Promise<HandleExecutionResult> {
  const session = getActiveSessionOrThrow(sessionProvider, 'godot_continue');
  await runCommand(
    session,
    'Continue',
    ['Call godot_get_session_state to see whether the game is still paused'],
    () => session.client.continue(args.thread_id, token),
  );
  return {
    status: 'continued',
    message: 'Execution resumed',
    thread_id: args.thread_id,
    state: session.getState(),
  };
}

export async function handleStepOver(
  sessionProvider: SessionProvider,
  args: ThreadArgs,
  token?: CancellationToken,
): Promise<HandleExecutionResult> {
  const session = getActiveSessionOrThrow(sessionProvider, 'godot_step_over');
  await runCommand(
    session,
    'Step over',
    ['Call godot_get_stack_trace to see where the game stopped'],
    () => session.client.next(args.thread_id, token),
  );
  return {
    status: 'stepped',
    message: 'Stepped over the current line',
    thread_id: args.thread_id,
    state: session.getState(),
  };
}

export async function handleStepInto(
  sessionProvider: SessionProvider,
  args: ThreadArgs,
  token?: CancellationToken,
): Promise<HandleExecutionResult> {
  const session = getActiveSessionOrThrow(sessionProvider, 'godot_step_into');
  await runCommand(
    session,
    'Step into',
    ['Call godot_get_stack_trace to see where the game stopped'],
    () => session.client.stepIn(args.thread_id, token),
  );
  return {
    status: 'stepped',
    message: 'Stepped into the call on the current line',
    thread_id: args.thread_id,
    state: session.getState(),
  };
}

export async function handleStepOut(
  sessionProvider: SessionProvider,
  args: ThreadArgs,
  token?: CancellationToken,
): Promise<HandleExecutionResult> {
  const session = getActiveSessionOrThrow(sessionProvider, 'godot_step_out');
  try {
    await session.client.stepOut(args.thread_id, token);
  } catch (error) {
    if (error instanceof UnsupportedCommandError) {
      throw new ToolProblemError('Step out is not supported by this debugger', {
        context: `session state: ${session.getState()}`,
        suggestions: [
          'Use godot_step_over until the function returns',
          'Or set a breakpoint in the caller and call godot_continue',
        ],
        cause: error,
      });
    }
    throw error;
  }
  return {
    status: 'stepped',
    message: 'Stepped out of the current function',
    thread_id: args.thread_id,
    state: session.getState(),
  };
}

export async function handlePause(
  sessionProvider: SessionProvider,
  args: ThreadArgs,
  token?: CancellationToken,
): Promise<HandleExecutionResult> {
  const session = getActiveSessionOrThrow(sessionProvider, 'godot_pause');
  await runCommand(
    session,
    'Pause request',
    ['The game may be busy in engine code; set a breakpoint and call godot_continue instead'],
    () => session.client.pause(args.thread_id, token),
  );
  return {
    status: 'pause_requested',
    message: 'Pause requested; the game stops at the next statement',
    thread_id: args.thread_id,
    state: session.getState(),
  };
}

export async function handleGetThreads(
  sessionProvider: SessionProvider,
  _args: GetThreadsArgs,
  token?: CancellationToken,
): Promise<HandleGetThreadsResult> {
  const session = getActiveSessionOrThrow(sessionProvider, 'godot_get_threads');
  const threads = await runCommand(
    session,
    'Listing threads',
    ['Call godot_get_session_state to check the session'],
    () => session.client.threads(token),
  );
  return {
    count: threads.length,
    threads: threads.map((t) => ({ id: t.id, name: t.name })),
  };
}

export async function handleGetStackTrace(
  sessionProvider: SessionProvider,
  args: GetStackTraceArgs,
  token?: CancellationToken,
): Promise<HandleGetStackTraceResult> {
  const session = getActiveSessionOrThrow(sessionProvider, 'godot_get_stack_trace');
  const body = await runCommand(
    session,
    'Reading the stack trace',
    ['Call godot_get_threads to check the thread id'],
    () => session.client.stackTrace(args.thread_id, 0, args.max_frames, token),
  );
  return {
    thread_id: args.thread_id,
    total_frames: body.totalFrames,
    frames: body.stackFrames.map((frame) => ({
      id: frame.id,
      name: frame.name,
      source: frame.source?.path ?? frame.source?.name,
      line: frame.line,
      column: frame.column,
    })),
  };
}

export async function handleGetScopes(
  sessionProvider: SessionProvider,
  args: GetScopesArgs,
  token?: CancellationToken,
): Promise<HandleGetScopesResult> {
  const session = getActiveSessionOrThrow(sessionProvider, 'godot_get_scopes');
  const scopes = await runCommand(
    session,
    'Reading scopes',
    ['Call godot_get_stack_trace for valid frame ids'],
    () => session.client.scopes(args.frame_id, token),
  );
  return {
    frame_id: args.frame_id,
    scopes: scopes.map((scope) => ({
      name: scope.name,
      variables_reference: scope.variablesReference,
      expensive: scope.expensive,
    })),
  };
}

export async function handleGetVariables(
  sessionProvider: SessionProvider,
  args: GetVariablesArgs,
  token?: CancellationToken,
): Promise<HandleGetVariablesResult> {
  const session = getActiveSessionOrThrow(sessionProvider, 'godot_get_variables');
  const variables = await runCommand(
    session,
    'Reading variables',
    ['Call godot_get_scopes for a current variables reference; references expire when the game resumes'],
    () => session.client.variables(args.variables_reference, token),
  );
  return {
    variables_reference: args.variables_reference,
    count: variables.length,
    variables: formatVariableList(variables),
  };
}

export async function handleEvaluate(
  sessionProvider: SessionProvider,
  args: EvaluateArgs,
  token?: CancellationToken,
): Promise<HandleEvaluateResult> {
  const session = getActiveSessionOrThrow(sessionProvider, 'godot_evaluate');
  const body = await runCommand(
    session,
    `Evaluating "${args.expression}"`,
    [
      'Check the expression is valid GDScript in the selected frame',
      'Call godot_get_stack_trace for valid frame ids',
    ],
    () => session.client.evaluate(args.expression, args.frame_id, args.context, token),
  );
  const type = body.type ?? '';
  const result: HandleEvaluateResult = {
    expression: args.expression,
    result: body.result,
    type,
  };
  const formatted = formatGodotValue(type, body.result);
  if (formatted !== undefined) {
    result.formatted = formatted;
  }
  if (body.variablesReference > 0) {
    result.expandable = true;
    result.variables_reference = body.variablesReference;
  }
  return result;
}

/**
 * Always fails: the Godot debug adapter advertises `supportsSetVariable` but
 * does not implement it, and GDScript assignments are statements, so
 * `evaluate` cannot stand in.
 */
export async function handleSetVariable(
  sessionProvider: SessionProvider,
  args: SetVariableArgs,
): Promise<never> {
  const toolName = 'godot_set_variable';
  getActiveSessionOrThrow(sessionProvider, toolName);
  if (!GDSCRIPT_IDENTIFIER.test(args.variable_name)) {
    throw invalidArgument(
      sessionProvider,
      toolName,
      'variable_name',
      `"${args.variable_name}" is not a GDScript identifier`,
    );
  }
  throw new ToolProblemError(
    'Variable assignment is not available: the Godot debug adapter advertises it but does not implement it',
    {
      context: `${args.variable_name} = ${JSON.stringify(args.value)} in frame ${args.frame_id}`,
      suggestions: [
        'Inspect values with godot_get_variables or godot_evaluate',
        'Change the value in the script and relaunch',
      ],
      errorType: 'unsupported_command',
    },
  );
}
