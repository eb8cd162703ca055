import { expect } from 'chai';
import * as sinon from 'sinon';
import type { DebugProtocol } from '@vscode/debugprotocol';
import {
  DAPSessionHandler,
  DAPSessionHandlerOptions,
  StoppedPayload,
} from '../src/dapSessionHandler';
import { DAPProtocolClient } from '../src/dapProtocolClient';
import {
  ConnectionClosedError,
  RemoteError,
  StateError,
  TimeoutError,
  UnsupportedCommandError,
} from '../src/errors';
import { SessionState } from '../src/sessionState';
import { FakeDapPeer, createPeerPair, scriptGodotDebugger } from './fakeDapPeer';
import { createMockLogger, delay } from './testLogger';

async function expectRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected the promise to reject');
}

function createHandler(options: DAPSessionHandlerOptions = {}): {
  peer: FakeDapPeer;
  handler: DAPSessionHandler;
  protocolClient: DAPProtocolClient;
} {
  const { peer, clientReadable, clientWritable } = createPeerPair();
  const logger = createMockLogger();
  const protocolClient = new DAPProtocolClient(logger);
  const handler = new DAPSessionHandler(protocolClient, logger, options);
  handler.attachTransport(clientReadable, clientWritable);
  return { peer, handler, protocolClient };
}

async function bringToRunning(handler: DAPSessionHandler): Promise<void> {
  await handler.initialize();
  const handshake = handler.startLaunch({ project: '/tmp/game' });
  await handshake.issued;
  await handler.configurationDone();
  await handshake.response;
}

function nextStop(handler: DAPSessionHandler): Promise<StoppedPayload> {
  return new Promise((resolve) => handler.once('stopped', resolve));
}

function nextState(handler: DAPSessionHandler, state: SessionState): Promise<void> {
  return new Promise((resolve) => {
    const listener = (payload: { to: SessionState }): void => {
      if (payload.to === state) {
        handler.off('stateChanged', listener);
        resolve();
      }
    };
    handler.on('stateChanged', listener);
  });
}

async function bringToPaused(handler: DAPSessionHandler, peer: FakeDapPeer): Promise<void> {
  await bringToRunning(handler);
  const stopped = nextStop(handler);
  peer.sendEvent('stopped', { reason: 'breakpoint', threadId: 1 });
  await stopped;
}

describe('DAPSessionHandler', () => {
  let peer: FakeDapPeer;
  let handler: DAPSessionHandler;
  let protocolClient: DAPProtocolClient;

  beforeEach(() => {
    ({ peer, handler, protocolClient } = createHandler());
  });

  afterEach(async () => {
    if (handler.status !== 'disconnected') {
      protocolClient.dispose('Test finished');
    }
    handler.removeAllListeners();
  });

  describe('state checks', () => {
    it('rejects commands issued in the wrong state without writing a byte', async () => {
      const sendRequest = sinon.spy(protocolClient, 'sendRequest');
      const calls: Array<() => Promise<unknown>> = [
        () => handler.continue(1),
        () => handler.stackTrace(1),
        () => handler.setBreakpoints('/tmp/game/player.gd', [56]),
        () => handler.launch({ project: '/tmp/game' }),
        () => handler.configurationDone(),
        () => handler.pause(1),
      ];

      for (const call of calls) {
        const error = await expectRejection(call());
        expect(error).to.be.instanceOf(StateError);
      }
      await delay(10);

      expect(peer.bytesReceived).to.equal(0);
      expect(sendRequest.called).to.equal(false);
      expect(handler.status).to.equal('connected');
    });

    it('names the command, the state and the allowed states', async () => {
      const error = await expectRejection(handler.next(1));
      expect(error).to.be.instanceOf(StateError);
      if (error instanceof StateError) {
        expect(error.command).to.equal('next');
        expect(error.state).to.equal('connected');
        expect(error.message).to.equal(
          '"next" called in invalid state: connected. Expected one of: paused.',
        );
      }
    });

    it('refuses breakpoint changes once the program runs', async () => {
      scriptGodotDebugger(peer);
      await bringToPaused(handler, peer);
      const before = peer.bytesReceived;

      const error = await expectRejection(
        handler.setBreakpoints('/tmp/game/player.gd', [10]),
      );
      await delay(10);
      expect(error).to.be.instanceOf(StateError);
      expect(peer.bytesReceived).to.equal(before);
    });
  });

  describe('initialize', () => {
    it('waits for the initialized event before reporting initialized', async () => {
      peer.on('initialize', (request) =>
        peer.respond(request, { supportsConfigurationDoneRequest: true }),
      );
      const pending = handler.initialize();
      await delay(20);
      expect(handler.status).to.equal('connected');

      peer.sendEvent('initialized');
      expect(await pending).to.deep.equal({ supportsConfigurationDoneRequest: true });
      expect(handler.status).to.equal('initialized');
    });

    it('accepts an initialized event that precedes the response', async () => {
      peer.on('initialize', (request) => {
        peer.sendEvent('initialized');
        peer.respond(request, {});
      });
      await handler.initialize();
      expect(handler.status).to.equal('initialized');
    });

    it('sends the Godot client arguments', async () => {
      scriptGodotDebugger(peer);
      await handler.initialize();
      const [request] = peer.received;
      expect(request.arguments).to.include({
        adapterID: 'godot',
        linesStartAt1: true,
        columnsStartAt1: true,
        pathFormat: 'path',
      });
    });
  });

  describe('launch handshake', () => {
    it('moves configuring -> running once configurationDone and launch are answered', async () => {
      scriptGodotDebugger(peer);
      const states: SessionState[] = [];
      handler.on('stateChanged', ({ to }) => states.push(to));

      await bringToRunning(handler);
      expect(states).to.deep.equal(['initialized', 'configuring', 'running']);
      expect(peer.commands()).to.deep.equal(['initialize', 'launch', 'configurationDone']);
    });

    it('stays configuring when the launch fails', async () => {
      scriptGodotDebugger(peer);
      let launchRequest: DebugProtocol.Request | undefined;
      peer
        .on('launch', (request) => {
          launchRequest = request;
        })
        .on('configurationDone', (request) => {
          peer.respond(request);
          if (launchRequest) {
            peer.fail(launchRequest, 'Failed to run project');
          }
        });

      await handler.initialize();
      const handshake = handler.startLaunch({ project: '/tmp/game' });
      const outcome = expectRejection(handshake.response);
      await handshake.issued;
      await handler.configurationDone();

      const error = await outcome;
      expect(error).to.be.instanceOf(RemoteError);
      expect(handler.status).to.equal('configuring');
    });

    it('goes straight to paused when the program stops before the launch response', async () => {
      scriptGodotDebugger(peer);
      peer.on('configurationDone', (request) => {
        peer.respond(request);
        peer.sendEvent('stopped', { reason: 'entry', threadId: 1 });
      });
      await handler.initialize();
      const handshake = handler.startLaunch({ project: '/tmp/game' });
      await handshake.issued;
      const launchRequest = peer.received[1];
      await handler.configurationDone();
      await delay(10);
      peer.respond(launchRequest);
      await handshake.response;

      expect(handler.status).to.equal('paused');
      expect(handler.lastStopReason).to.equal('entry');
    });

    it('reaches running when the launch reply comes before the configurationDone reply', async () => {
      scriptGodotDebugger(peer);
      let launchRequest: DebugProtocol.Request | undefined;
      peer
        .on('launch', (request) => {
          launchRequest = request;
        })
        .on('configurationDone', (request) => {
          if (launchRequest) {
            peer.respond(launchRequest);
          }
          peer.respond(request);
        });
      const states: SessionState[] = [];
      handler.on('stateChanged', ({ to }) => states.push(to));

      await handler.initialize();
      const handshake = handler.startLaunch({ project: '/tmp/game' });
      await handshake.issued;
      const [configured, launched] = await Promise.all([
        handler.configurationDone(),
        handshake.response,
      ]);

      expect(configured.success).to.equal(true);
      expect(launched.command).to.equal('launch');
      expect(handler.status).to.equal('running');
      expect(states).to.deep.equal(['initialized', 'configuring', 'running']);
    });

    it('waits for the new launch reply after a connection dropped mid-handshake', async () => {
      scriptGodotDebugger(peer);
      await handler.initialize();
      const abandoned = handler.startLaunch({ project: '/tmp/game' });
      const abandonedOutcome = expectRejection(abandoned.response);
      await abandoned.issued;
      const ended = new Promise<void>((resolve) => handler.once('sessionEnded', () => resolve()));
      peer.close();
      await ended;
      expect(await abandonedOutcome).to.be.instanceOf(ConnectionClosedError);
      expect(handler.status).to.equal('disconnected');

      const second = createPeerPair();
      second.peer
        .on('initialize', (request) => {
          second.peer.respond(request, { supportsConfigurationDoneRequest: true });
          second.peer.sendEvent('initialized');
        })
        .on('launch', () => undefined)
        .on('configurationDone', (request) => second.peer.respond(request));
      handler.attachTransport(second.clientReadable, second.clientWritable);

      await handler.initialize();
      const handshake = handler.startLaunch({ project: '/tmp/game' });
      await handshake.issued;
      await handler.configurationDone();
      expect(handler.status).to.equal('configuring');

      const heldLaunch = second.peer.received.find((r) => r.command === 'launch');
      if (!heldLaunch) {
        throw new Error('launch never reached the second peer');
      }
      second.peer.respond(heldLaunch);
      await handshake.response;
      expect(handler.status).to.equal('running');
    });
  });

  describe('single flight', () => {
    it('holds the second command until the first is answered', async () => {
      scriptGodotDebugger(peer);
      await bringToPaused(handler, peer);

      const threads = handler.threads();
      const stack = handler.stackTrace(1);
      const threadsRequest = await peer.nextRequest();
      expect(threadsRequest.command).to.equal('threads');

      await delay(30);
      expect(peer.commands().filter((command) => command === 'stackTrace')).to.have.length(0);

      peer.respond(threadsRequest, { threads: [{ id: 1, name: 'Main' }] });
      const stackRequest = await peer.nextRequest();
      expect(stackRequest.command).to.equal('stackTrace');
      expect(stackRequest.arguments).to.deep.equal({ threadId: 1, startFrame: 0, levels: 20 });
      peer.respond(stackRequest, {
        stackFrames: [{ id: 0, name: '_ready', line: 56, column: 1 }],
        totalFrames: 1,
      });

      expect(await threads).to.deep.equal([{ id: 1, name: 'Main' }]);
      expect((await stack).stackFrames[0].line).to.equal(56);
    });
  });

  describe('execution control', () => {
    beforeEach(() => {
      scriptGodotDebugger(peer);
    });

    it('keeps the stop reason as an open string', async () => {
      await bringToRunning(handler);
      const stopped = nextStop(handler);
      peer.sendEvent('stopped', { reason: 'script error', threadId: 1, text: 'Null instance' });

      const payload = await stopped;
      expect(payload.reason).to.equal('script error');
      expect(payload.text).to.equal('Null instance');
      expect(handler.lastStopReason).to.equal('script error');
      expect(handler.status).to.equal('paused');
    });

    it('falls back to "unknown" when a stop has no reason', async () => {
      await bringToRunning(handler);
      const stopped = nextStop(handler);
      peer.sendEvent('stopped', { threadId: 1 });
      expect((await stopped).reason).to.equal('unknown');
    });

    it('continues into running', async () => {
      await bringToPaused(handler, peer);
      peer.on('continue', (request) => peer.respond(request, { allThreadsContinued: true }));

      expect(await handler.continue(1)).to.deep.equal({ allThreadsContinued: true });
      expect(handler.status).to.equal('running');
    });

    it('stays paused when the next stop overtakes the step response', async () => {
      await bringToPaused(handler, peer);
      peer.on('next', (request) => {
        peer.sendEvent('stopped', { reason: 'step', threadId: 1 });
        peer.respond(request);
      });

      await handler.next(1);
      expect(handler.status).to.equal('paused');
      expect(handler.lastStopReason).to.equal('step');
    });

    it('pauses a running program', async () => {
      await bringToRunning(handler);
      peer.on('pause', (request) => peer.respond(request));
      await handler.pause(1);
      expect(handler.status).to.equal('paused');
    });

    it('follows continued events back to running', async () => {
      await bringToPaused(handler, peer);
      const running = nextState(handler, 'running');
      peer.sendEvent('continued', { threadId: 1 });
      await running;
      expect(handler.status).to.equal('running');
    });
  });

  describe('stepOut', () => {
    it('reports a target that never answers as unsupported and stays usable', async () => {
      ({ peer, handler, protocolClient } = createHandler({ stepOutTimeoutMs: 50 }));
      scriptGodotDebugger(peer);
      await bringToPaused(handler, peer);

      const error = await expectRejection(handler.stepOut(1));
      expect(error).to.be.instanceOf(UnsupportedCommandError);
      if (error instanceof UnsupportedCommandError) {
        expect(error.command).to.equal('stepOut');
        expect(error.cause).to.be.instanceOf(TimeoutError);
      }
      expect(handler.status).to.equal('paused');

      const threads = handler.threads();
      peer.respond(await peer.nextRequest(), { threads: [] });
      expect(await threads).to.deep.equal([]);
    });

    it('reports an error response as unsupported', async () => {
      scriptGodotDebugger(peer);
      peer.on('stepOut', (request) => peer.fail(request, 'Not implemented'));
      await bringToPaused(handler, peer);

      const error = await expectRejection(handler.stepOut(1));
      expect(error).to.be.instanceOf(UnsupportedCommandError);
      if (error instanceof UnsupportedCommandError) {
        expect(error.cause).to.be.instanceOf(RemoteError);
      }
    });
  });

  describe('teardown', () => {
    beforeEach(() => {
      scriptGodotDebugger(peer);
    });

    it('fails outstanding calls with ConnectionClosedError on disconnect', async () => {
      await bringToPaused(handler, peer);
      const ended = new Promise<string>((resolve) =>
        handler.once('sessionEnded', ({ reason }) => resolve(reason)),
      );

      const evaluation = handler.evaluate('player.health', 0);
      await peer.nextRequest();
      const outcome = expectRejection(evaluation);
      await handler.disconnect();

      expect(await outcome).to.be.instanceOf(ConnectionClosedError);
      expect(await ended).to.equal('Session disconnected');
      expect(handler.status).to.equal('disconnected');
      expect(peer.commands()).to.include('disconnect');

      const after = await expectRejection(handler.threads());
      expect(after).to.be.instanceOf(StateError);
    });

    it('passes terminateDebuggee to the target', async () => {
      await bringToRunning(handler);
      await handler.disconnect(true);
      const request = peer.received.find((r) => r.command === 'disconnect');
      expect(request?.arguments).to.deep.equal({ terminateDebuggee: true });
    });

    it('moves to terminated on a terminated event and still allows disconnect', async () => {
      await bringToRunning(handler);
      const terminated = nextState(handler, 'terminated');
      peer.sendEvent('terminated');
      await terminated;

      expect(await expectRejection(handler.threads())).to.be.instanceOf(StateError);
      await handler.disconnect();
      expect(handler.status).to.equal('disconnected');
    });

    it('ends the session when the peer closes the connection', async () => {
      await bringToPaused(handler, peer);
      const ended = new Promise<void>((resolve) => handler.once('sessionEnded', () => resolve()));

      const pending = expectRejection(handler.variables(1000));
      await peer.nextRequest();
      peer.close();

      expect(await pending).to.be.instanceOf(ConnectionClosedError);
      await ended;
      expect(handler.status).to.equal('disconnected');
    });
  });
});
