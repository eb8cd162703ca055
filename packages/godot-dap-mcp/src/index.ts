import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
} from '@modelcontextprotocol/sdk/types.js';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import {
  CancellationToken,
  CancellationTokenSource,
  DebugSession,
  LoggerInterface,
  StateError,
  tokenFromAbortSignal,
} from 'dap-session-client';
import {
  McpAsyncEvent,
  McpAsyncEventType,
} from './types/mcp_protocol_extensions';
import * as toolArgs from './types/toolArgs';
import { AnyToolResult, HandleConnectResult } from './types/toolResults';
import {
  SessionProvider,
  explainStateError,
  handleAttach,
  handleClearBreakpoint,
  handleConnect,
  handleContinue,
  handleDisconnect,
  handleEvaluate,
  handleGetScopes,
  handleGetSessionState,
  handleGetStackTrace,
  handleGetThreads,
  handleGetVariables,
  handleLaunchCurrentScene,
  handleLaunchMainScene,
  handleLaunchScene,
  handlePause,
  handlePing,
  handleSetBreakpoint,
  handleSetVariable,
  handleStepInto,
  handleStepOut,
  handleStepOver,
  invalidArgument,
} from './tools';
import { McpErrorBuilder, TOOL_EXECUTION_ERROR, classifyError } from './errorUtils';
import * as schemas from './schemas';
import { ToolInputSchema } from './schemas';
import { BreakpointPlanRegistry } from './breakpointPlan';
import { ServerConfig, parseConfig } from './config';
import { createLogger } from './logger';
import { LineTransport } from './lineTransport';

export const SERVER_NAME = 'godot-dap-mcp';
export const SERVER_VERSION = '0.1.0';

export interface ToolCallResult {
  [key: string]: unknown;
  content: { type: 'text'; text: string }[];
}

interface McpToolResponsePayload extends Record<string, unknown> {
  asyncEvents: McpAsyncEvent[];
}

type ToolHandler<TArgs, TResult extends AnyToolResult> = (
  sessionProvider: SessionProvider,
  args: TArgs,
  token: CancellationToken,
) => Promise<TResult>;

interface ToolRegistryEntry {
  description: string;
  schema: ToolInputSchema;
  run(
    sessionProvider: SessionProvider,
    args: unknown,
    token: CancellationToken,
  ): Promise<AnyToolResult>;
}

const toolRegistry = new Map<string, ToolRegistryEntry>();

function registerTool<TArgs, TResult extends AnyToolResult>(
  name: string,
  description: string,
  schema: ToolInputSchema,
  argsSchema: z.ZodType<TArgs, z.ZodTypeDef, unknown>,
  handler: ToolHandler<TArgs, TResult>,
) {
  toolRegistry.set(name, {
    description,
    schema,
    run: async (sessionProvider, rawArgs, token) => {
      const parsed = argsSchema.safeParse(rawArgs ?? {});
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw invalidArgument(
          sessionProvider,
          name,
          issue && issue.path.length > 0 ? issue.path.join('.') : 'arguments',
          issue ? issue.message : parsed.error.message,
        );
      }
      return handler(sessionProvider, parsed.data, token);
    },
  });
}

function initializeTools() {
  registerTool(
    'godot_ping',
    'Checks that the server is alive. Echoes the message with a timestamp.',
    schemas.pingSchema,
    toolArgs.pingArgs,
    handlePing,
  );
  registerTool(
    'godot_connect',
    'Connects to the debug adapter of a running Godot editor and completes the initialize handshake. Call this first.',
    schemas.connectSchema,
    toolArgs.connectArgs,
    handleConnect,
  );
  registerTool(
    'godot_disconnect',
    'Ends the debug session and closes the connection to the Godot editor.',
    schemas.disconnectSchema,
    toolArgs.disconnectArgs,
    handleDisconnect,
  );
  registerTool(
    'godot_get_session_state',
    'Reports the session state, the last stop reason, the debugger capabilities and the breakpoints waiting for the next launch.',
    schemas.getSessionStateSchema,
    toolArgs.getSessionStateArgs,
    handleGetSessionState,
  );
  registerTool(
    'godot_launch_main_scene',
    "Launches the project's main scene (like F5 in the editor). Planned breakpoints are sent during the launch handshake.",
    schemas.launchMainSceneSchema,
    toolArgs.launchMainSceneArgs,
    handleLaunchMainScene,
  );
  registerTool(
    'godot_launch_scene',
    'Launches a specific scene by resource path. Planned breakpoints are sent during the launch handshake.',
    schemas.launchSceneSchema,
    toolArgs.launchSceneArgs,
    handleLaunchScene,
  );
  registerTool(
    'godot_launch_current_scene',
    'Launches the scene currently open in the editor. Planned breakpoints are sent during the launch handshake.',
    schemas.launchCurrentSceneSchema,
    toolArgs.launchCurrentSceneArgs,
    handleLaunchCurrentScene,
  );
  registerTool(
    'godot_attach',
    'Attaches to a game the editor is already running. Planned breakpoints are sent during the attach handshake.',
    schemas.attachSchema,
    toolArgs.attachArgs,
    handleAttach,
  );
  registerTool(
    'godot_set_breakpoint',
    'Sets a breakpoint at a script line. Before a launch it is recorded and sent with the launch.',
    schemas.setBreakpointSchema,
    toolArgs.setBreakpointArgs,
    handleSetBreakpoint,
  );
  registerTool(
    'godot_clear_breakpoint',
    'Removes every breakpoint in a script.',
    schemas.clearBreakpointSchema,
    toolArgs.clearBreakpointArgs,
    handleClearBreakpoint,
  );
  registerTool(
    'godot_continue',
    'Resumes a paused game.',
    schemas.threadSchema,
    toolArgs.threadArgs,
    handleContinue,
  );
  registerTool(
    'godot_step_over',
    'Executes the current line and stops at the next one.',
    schemas.threadSchema,
    toolArgs.threadArgs,
    handleStepOver,
  );
  registerTool(
    'godot_step_into',
    'Steps into the function called on the current line.',
    schemas.threadSchema,
    toolArgs.threadArgs,
    handleStepInto,
  );
  registerTool(
    'godot_step_out',
    'Runs until the current function returns. The Godot editor does not implement this; the tool then fails and suggests alternatives.',
    schemas.threadSchema,
    toolArgs.threadArgs,
    handleStepOut,
  );
  registerTool(
    'godot_pause',
    'Pauses the running game.',
    schemas.threadSchema,
    toolArgs.threadArgs,
    handlePause,
  );
  registerTool(
    'godot_get_threads',
    'Lists the threads of the game.',
    schemas.getThreadsSchema,
    toolArgs.getThreadsArgs,
    handleGetThreads,
  );
  registerTool(
    'godot_get_stack_trace',
    'Returns the call stack of a paused thread.',
    schemas.getStackTraceSchema,
    toolArgs.getStackTraceArgs,
    handleGetStackTrace,
  );
  registerTool(
    'godot_get_scopes',
    'Returns the variable scopes (Locals, Members, Globals) of a stack frame.',
    schemas.getScopesSchema,
    toolArgs.getScopesArgs,
    handleGetScopes,
  );
  registerTool(
    'godot_get_variables',
    'Returns the variables of a scope or of an expandable variable, with readable forms of engine types.',
    schemas.getVariablesSchema,
    toolArgs.getVariablesArgs,
    handleGetVariables,
  );
  registerTool(
    'godot_evaluate',
    'Evaluates a GDScript expression in a stack frame.',
    schemas.evaluateSchema,
    toolArgs.evaluateArgs,
    handleEvaluate,
  );
  registerTool(
    'godot_set_variable',
    'Would change a variable at runtime. The Godot debug adapter does not implement assignment, so this explains the limitation.',
    schemas.setVariableSchema,
    toolArgs.setVariableArgs,
    handleSetVariable,
  );
}

export interface GodotDapMcpServerOptions {
  logger: LoggerInterface;
  config: ServerConfig;
}

/**
 * Godot DAP MCP Server
 *
 * Exposes a Godot editor debug session to MCP clients as godot_* tools.
 */
export class GodotDapMcpServer implements SessionProvider {
  private readonly server: Server;
  private readonly logger: LoggerInterface;
  private readonly config: ServerConfig;
  private readonly breakpointPlan = new BreakpointPlanRegistry();
  private activeSession?: DebugSession;
  private pendingConnect?: Promise<HandleConnectResult>;
  private closed = false;
  private asyncEventQueue: McpAsyncEvent[] = [];
  private readonly MAX_ASYNC_EVENT_QUEUE_SIZE = 100;

  constructor(options: GodotDapMcpServerOptions) {
    this.logger = options.logger;
    this.config = options.config;
    this.server = new Server(
      { name: SERVER_NAME, version: SERVER_VERSION },
      { capabilities: { tools: {} } },
    );
    this.server.onerror = (error) =>
      this.logger.error({ err: error }, '[MCP Error]');

    initializeTools();
    this.setupToolHandlers();
  }

  public getLogger(): LoggerInterface {
    return this.logger;
  }

  public getConfig(): ServerConfig {
    return this.config;
  }

  public getSession(): DebugSession | undefined {
    return this.activeSession;
  }

  /** After shutdown no session becomes active; a connect still under way then closes its own. */
  public setActiveSession(session: DebugSession | undefined): void {
    if (this.closed && session) {
      this.logger.warn(
        `Server is shut down; not activating session ${session.client.sessionId}`,
      );
      return;
    }
    this.activeSession = session;
  }

  public getPendingConnect(): Promise<HandleConnectResult> | undefined {
    return this.pendingConnect;
  }

  public setPendingConnect(
    connect: Promise<HandleConnectResult> | undefined,
  ): void {
    this.pendingConnect = connect;
  }

  public getBreakpointPlan(): BreakpointPlanRegistry {
    return this.breakpointPlan;
  }

  public openSession(projectRoot?: string): DebugSession {
    const session = new DebugSession(this.logger, {
      connectTimeoutMs: this.config.connectTimeoutMs,
      commandTimeoutMs: this.config.commandTimeoutMs,
      projectRoot,
    });
    this.attachSessionListeners(session);
    return session;
  }

  private attachSessionListeners(session: DebugSession): void {
    const handler = session.client;
    const sessionId = handler.sessionId;

    handler.on('stopped', (payload) => {
      this._queueAsyncEvent(sessionId, 'dap_event_stopped', payload);
    });
    handler.on('output', (payload) => {
      this._queueAsyncEvent(sessionId, 'dap_event_output', {
        category: payload.category,
        output: payload.output,
      });
    });
    handler.on('dapEvent', (event) => {
      switch (event.event) {
        case 'continued':
          this._queueAsyncEvent(sessionId, 'dap_event_continued', event.body);
          break;
        case 'thread':
          this._queueAsyncEvent(sessionId, 'dap_event_thread', event.body);
          break;
        case 'breakpoint':
          this._queueAsyncEvent(sessionId, 'dap_event_breakpoint', event.body);
          break;
        case 'terminated':
          this._queueAsyncEvent(sessionId, 'dap_event_terminated', event.body);
          break;
        case 'exited':
          this._queueAsyncEvent(sessionId, 'dap_event_exited', event.body);
          break;
        default:
          break;
      }
    });
    handler.on('protocolError', (error) => {
      this._queueAsyncEvent(sessionId, 'dap_protocol_error', {
        message: error.message,
      });
    });
    handler.on('sessionEnded', (payload) => {
      this.logger.info(
        `[DAPEvent] SessionEnded for session ${payload.sessionId}. Reason: ${payload.reason}`,
      );
      // A disconnect the caller asked for clears the active session first.
      if (this.activeSession !== session) {
        return;
      }
      this.activeSession = undefined;
      this._queueAsyncEvent(sessionId, 'unexpected_session_termination', {
        reason: payload.reason,
        underlyingError: payload.error
          ? { message: payload.error.message, name: payload.error.name }
          : undefined,
      });
    });
  }

  private _queueAsyncEvent(
    sessionId: string,
    eventType: McpAsyncEventType,
    data: unknown,
  ): void {
    if (this.asyncEventQueue.length >= this.MAX_ASYNC_EVENT_QUEUE_SIZE) {
      const oldestEvent = this.asyncEventQueue.shift();
      this.logger.warn(
        `Async event queue full. Dropped oldest event: ${oldestEvent?.eventId} (${oldestEvent?.eventType})`,
      );
    }
    const event: McpAsyncEvent = {
      eventId: randomUUID(),
      timestamp: new Date().toISOString(),
      sessionId,
      eventType,
      data,
    };
    this.asyncEventQueue.push(event);
    this.logger.debug(
      `[AsyncEventQueued] Event: ${eventType}, SessionID: ${sessionId}, QueueSize: ${this.asyncEventQueue.length}`,
    );
  }

  public drainAsyncEventQueue(): McpAsyncEvent[] {
    const events = [...this.asyncEventQueue];
    this.asyncEventQueue = [];
    return events;
  }

  public listTools(): { name: string; description: string; inputSchema: ToolInputSchema }[] {
    return Array.from(toolRegistry.entries()).map(
      ([name, { description, schema }]) => ({
        name,
        description,
        inputSchema: schema,
      }),
    );
  }

  /**
   * Runs one tool. Failures are thrown as `McpError`: -32601 for an unknown
   * tool, -32602 for bad arguments, -32000 when the tool itself failed.
   */
  public async callTool(
    name: string,
    args: unknown,
    signal?: AbortSignal,
  ): Promise<ToolCallResult> {
    const toolInfo = toolRegistry.get(name);
    if (!toolInfo) {
      throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }
    const token = signal
      ? tokenFromAbortSignal(signal)
      : new CancellationTokenSource().token;

    try {
      const result = await toolInfo.run(this, args, token);
      return this.formatToolResponse(result, this.drainAsyncEventQueue());
    } catch (error: unknown) {
      this.handleToolError(name, error);
    }
  }

  private formatToolResponse(
    result: AnyToolResult,
    eventsToReturn: McpAsyncEvent[],
  ): ToolCallResult {
    const finalPayload: McpToolResponsePayload = {
      ...result,
      asyncEvents: eventsToReturn,
    };
    if (eventsToReturn.length > 0) {
      this.logger.info(
        `[formatToolResponse] Added ${eventsToReturn.length} async events to the response payload.`,
      );
    }
    return {
      content: [{ type: 'text', text: JSON.stringify(finalPayload) }],
    };
  }

  private handleToolError(toolName: string, error: unknown): never {
    this.logger.error({ err: error }, `[MCP Tool Error] ${toolName}`);

    if (error instanceof McpError) {
      throw error;
    }
    const explained = error instanceof StateError ? explainStateError(error) : error;
    const { errorType, data } = classifyError(explained);

    throw new McpErrorBuilder()
      .error(explained)
      .toolName(toolName)
      .mcpErrorCode(TOOL_EXECUTION_ERROR)
      .mcpDebugErrorType(errorType)
      .sessionProvider(this)
      .sessionId(this.activeSession?.client.sessionId)
      .additionalDebugData(data)
      .build();
  }

  private setupToolHandlers() {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: this.listTools(),
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
      const { name, arguments: args } = request.params;
      return this.callTool(name, args, extra.signal);
    });
  }

  public async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport);
  }

  public set onclose(listener: (() => void) | undefined) {
    this.server.onclose = listener;
  }

  /**
   * Disconnects the debug session, if any, waits for a connect still under
   * way to give up, and closes the MCP connection.
   */
  public async shutdown(): Promise<void> {
    this.closed = true;
    const session = this.activeSession;
    const pendingConnect = this.pendingConnect;
    this.activeSession = undefined;
    if (session && session.getState() !== 'disconnected') {
      try {
        await session.disconnect();
      } catch (error) {
        this.logger.warn(
          `Session did not disconnect cleanly: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }
    if (pendingConnect) {
      await pendingConnect.then(
        () => undefined,
        (error: unknown) =>
          this.logger.info(
            `Connect under way at shutdown ended: ${error instanceof Error ? error.message.split('\n')[0] : String(error)}`,
          ),
      );
    }
    await this.server.close();
  }
}

/** Serves the tools on stdin/stdout until a signal arrives or stdin ends. */
export async function main(argv: string[]): Promise<void> {
  const config = parseConfig(argv, process.env, SERVER_VERSION);
  const logger = createLogger({ level: config.logLevel, file: config.logFile });
  const server = new GodotDapMcpServer({ logger, config });

  let shuttingDown = false;
  const handleShutdown = async (reason: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`Shutting down Godot DAP MCP Server (${reason})...`);
    try {
      await server.shutdown();
    } catch (error) {
      logger.error({ err: error }, 'Shutdown failed');
    }
    logger.info('Godot DAP MCP Server shutdown complete.');
    logger.flush();
    process.exit(0);
  };

  process.on('SIGINT', () => void handleShutdown('SIGINT'));
  process.on('SIGTERM', () => void handleShutdown('SIGTERM'));
  server.onclose = () => void handleShutdown('stdin closed');

  const transport = new LineTransport(process.stdin, process.stdout, logger);
  await server.connect(transport);
  logger.info(
    `Godot DAP MCP Server running on stdio (DAP target ${config.host}:${config.port})`,
  );
}

// Create and run the server only if this script is executed directly
if (require.main === module) {
  main(process.argv.slice(2)).catch((error) => {
    console.error('Failed to start Godot DAP MCP Server:', error);
    process.exit(1);
  });
}
