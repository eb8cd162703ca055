export type SessionState =
  | 'disconnected'
  | 'connected'
  | 'initialized'
  | 'configuring'
  | 'running'
  | 'paused'
  | 'terminated';

export type DapCommand =
  | 'initialize'
  | 'launch'
  | 'attach'
  | 'setBreakpoints'
  | 'configurationDone'
  | 'continue'
  | 'next'
  | 'stepIn'
  | 'stepOut'
  | 'pause'
  | 'threads'
  | 'stackTrace'
  | 'scopes'
  | 'variables'
  | 'evaluate'
  | 'disconnect';

const LIVE_STATES: readonly SessionState[] = [
  'connected',
  'initialized',
  'configuring',
  'running',
  'paused',
  'terminated',
];

/** States in which each command may be put on the wire. */
export const COMMAND_ALLOWED_STATES: Readonly<
  Record<DapCommand, readonly SessionState[]>
> = {
  initialize: ['connected'],
  launch: ['initialized'],
  attach: ['initialized'],
  setBreakpoints: ['configuring'],
  configurationDone: ['configuring'],
  continue: ['paused'],
  next: ['paused'],
  stepIn: ['paused'],
  stepOut: ['paused'],
  pause: ['running'],
  threads: ['running', 'paused'],
  stackTrace: ['running', 'paused'],
  scopes: ['running', 'paused'],
  variables: ['running', 'paused'],
  evaluate: ['running', 'paused'],
  disconnect: LIVE_STATES,
};

/** Commands whose response the debugger holds back until `configurationDone`. */
export const DEFERRED_RESPONSE_COMMANDS: ReadonlySet<string> = new Set([
  'launch',
  'attach',
]);

/** Commands that may be matched by name when the seq lookup fails. */
export const HANDSHAKE_COMMANDS: ReadonlySet<string> = new Set([
  'launch',
  'attach',
  'configurationDone',
]);

const TRANSITIONS: Readonly<Record<SessionState, readonly SessionState[]>> = {
  disconnected: ['connected'],
  connected: ['initialized', 'terminated'],
  initialized: ['configuring', 'terminated'],
  configuring: ['running', 'paused', 'terminated'],
  running: ['paused', 'terminated'],
  paused: ['running', 'terminated'],
  terminated: ['disconnected'],
};

export function isCommandAllowed(
  command: DapCommand,
  state: SessionState,
): boolean {
  return COMMAND_ALLOWED_STATES[command].includes(state);
}

/**
 * Forward-only lifecycle; the one way back is `terminated -> disconnected`,
 * and any live state may drop to `terminated`.
 */
export function canTransition(from: SessionState, to: SessionState): boolean {
  return TRANSITIONS[from].includes(to);
}
