import { expect } from 'chai';
import type { DebugProtocol } from '@vscode/debugprotocol';
import {
  CancellationError,
  ConnectionClosedError,
  ProtocolError,
  RemoteError,
  StateError,
  TimeoutError,
  UnsupportedCommandError,
} from 'dap-session-client';
import {
  McpErrorBuilder,
  TOOL_EXECUTION_ERROR,
  ToolProblemError,
  classifyError,
  formatProblem,
} from '../src/errorUtils';
import { explainStateError } from '../src/tools';
import { createTestServer } from './testUtils';

describe('errorUtils', () => {
  describe('formatProblem', () => {
    it('renders context, numbered suggestions and the cause', () => {
      expect(
        formatProblem(
          'Failed to connect to Godot DAP server',
          '127.0.0.1:6006',
          ['Launch the Godot editor', 'Check the port setting'],
          new Error('connect ECONNREFUSED 127.0.0.1:6006'),
        ),
      ).to.equal(
        'Failed to connect to Godot DAP server (127.0.0.1:6006)\n\n' +
          'Suggestions:\n1. Launch the Godot editor\n2. Check the port setting\n\n' +
          'Error details: connect ECONNREFUSED 127.0.0.1:6006',
      );
    });

    it('is just the problem when nothing else is given', () => {
      expect(formatProblem('Something failed')).to.equal('Something failed');
    });
  });

  describe('classifyError', () => {
    const request: DebugProtocol.Request = {
      seq: 4,
      type: 'request',
      command: 'evaluate',
    };
    const response: DebugProtocol.Response = {
      seq: 9,
      type: 'response',
      request_seq: 4,
      command: 'evaluate',
      success: false,
      message: 'Invalid expression',
    };

    it('maps session client errors', () => {
      expect(classifyError(new RemoteError('Invalid expression', request, response))).to.deep.equal({
        errorType: 'dap_request_error',
        data: { dapRequestCommand: 'evaluate', dapResponseErrorBody: undefined },
      });
      expect(classifyError(new TimeoutError('threads', 500, 3))).to.deep.equal({
        errorType: 'operation_timeout',
        data: { operation: 'threads', timeoutMs: 500 },
      });
      expect(classifyError(new ConnectionClosedError('closed', 'socket end'))).to.deep.equal({
        errorType: 'connection_closed',
        data: { closeReason: 'socket end' },
      });
      expect(classifyError(new StateError('next', 'running', ['paused']))).to.deep.equal({
        errorType: 'state_error',
        data: {
          dapRequestCommand: 'next',
          sessionState: 'running',
          allowedStates: ['paused'],
        },
      });
      expect(classifyError(new UnsupportedCommandError('stepOut', 'nope')).errorType).to.equal(
        'unsupported_command',
      );
      expect(classifyError(new ProtocolError('bad frame')).errorType).to.equal('protocol_error');
      expect(classifyError(new CancellationError('cancelled')).errorType).to.equal(
        'request_cancelled',
      );
      expect(classifyError(new Error('other')).errorType).to.equal('tool_internal_error');
    });

    it('takes the type of a problem from its cause unless given', () => {
      const fromCause = new ToolProblemError('Failed', {
        cause: new TimeoutError('launch', 100, 2),
      });
      expect(classifyError(fromCause).errorType).to.equal('operation_timeout');

      const explicit = new ToolProblemError('Bad project', { errorType: 'invalid_project' });
      expect(classifyError(explicit)).to.deep.equal({
        errorType: 'invalid_project',
        data: {},
      });
    });
  });

  describe('explainStateError', () => {
    it('names the state, the allowed states and the next step', () => {
      const problem = explainStateError(new StateError('continue', 'running', ['paused']));
      expect(problem.message.split('\n\n').slice(0, 2)).to.deep.equal([
        '"continue" is not allowed while the session is running (allowed in: paused)',
        'Suggestions:\n1. The game is running; call godot_pause or wait for a breakpoint',
      ]);
      expect(classifyError(problem).errorType).to.equal('state_error');
    });
  });

  describe('McpErrorBuilder', () => {
    it('builds a tool error carrying the queued async events', () => {
      const server = createTestServer();
      const session = server.openSession();
      session.client.emit('output', {
        sessionId: session.client.sessionId,
        category: 'stdout',
        output: 'hi',
      });

      const error = new McpErrorBuilder()
        .error(new Error('boom'))
        .toolName('godot_evaluate')
        .mcpErrorCode(TOOL_EXECUTION_ERROR)
        .mcpDebugErrorType('tool_internal_error')
        .sessionProvider(server)
        .sessionId('session-1')
        .build();

      expect(error.code).to.equal(-32000);
      expect(error.message).to.equal('MCP error -32000: Error in tool godot_evaluate: boom');
      expect(error.data).to.have.property('errorType', 'tool_internal_error');
      expect(error.data).to.have.property('sessionId', 'session-1');
      expect(error.data).to.have.property('asyncEvents').with.lengthOf(1);
      expect(server.drainAsyncEventQueue()).to.deep.equal([]);
    });

    it('requires the tool name', () => {
      expect(() =>
        new McpErrorBuilder()
          .error(new Error('boom'))
          .mcpErrorCode(TOOL_EXECUTION_ERROR)
          .mcpDebugErrorType('tool_internal_error')
          .sessionProvider(createTestServer())
          .build(),
      ).to.throw("McpErrorBuilder: 'toolName' is required.");
    });
  });
});
