import { expect } from 'chai';
import type { DebugProtocol } from '@vscode/debugprotocol';
import { DebugSession, DEFAULT_DAP_PORT } from '../src/debugSession';
import { ConnectionClosedError, StateError } from '../src/errors';
import { SessionState } from '../src/sessionState';
import { FakeDapServer, scriptGodotDebugger } from './fakeDapPeer';
import { createMockLogger } from './testLogger';

async function expectRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected the promise to reject');
}

describe('DebugSession', () => {
  let server: FakeDapServer;
  let port: number;
  let session: DebugSession;

  beforeEach(async () => {
    server = new FakeDapServer((peer) => scriptGodotDebugger(peer));
    port = await server.listen();
    session = new DebugSession(createMockLogger(), { projectRoot: '/tmp/game' });
  });

  afterEach(async () => {
    if (session.getState() !== 'disconnected') {
      await session.disconnect();
    }
    await server.close();
  });

  it('defaults to the Godot editor port', () => {
    expect(DEFAULT_DAP_PORT).to.equal(6006);
  });

  it('walks the lifecycle from connect to running', async () => {
    const states: SessionState[] = [session.getState()];
    session.client.on('stateChanged', ({ to }) => states.push(to));

    await session.connect('127.0.0.1', port);
    const capabilities = await session.initialize();
    await session.launchAndConfigure({ project: '/tmp/game' });

    expect(capabilities.supportsConfigurationDoneRequest).to.equal(true);
    expect(states).to.deep.equal([
      'disconnected',
      'connected',
      'initialized',
      'configuring',
      'running',
    ]);
    expect(session.projectRoot).to.equal('/tmp/game');
  });

  it('orders launch, breakpoints and configurationDone on the wire', async () => {
    await session.connect('127.0.0.1', port);
    await session.initialize();
    const result = await session.launchAndConfigure({ project: '/tmp/game' }, [
      { path: '/tmp/game/player.gd', lines: [56] },
    ]);

    const [peer] = server.peers;
    expect(peer.commands()).to.deep.equal([
      'initialize',
      'launch',
      'setBreakpoints',
      'configurationDone',
    ]);
    expect(peer.transcript).to.deep.equal([
      'recv initialize',
      'send response initialize',
      'send event initialized',
      'recv launch',
      'recv setBreakpoints',
      'send response setBreakpoints',
      'recv configurationDone',
      'send response configurationDone',
      'send response launch',
    ]);

    const setBreakpoints: DebugProtocol.SetBreakpointsArguments = peer.received[2].arguments;
    expect(setBreakpoints.source.path).to.equal('/tmp/game/player.gd');
    expect(setBreakpoints.breakpoints).to.deep.equal([{ line: 56 }]);

    expect(result.response.command).to.equal('launch');
    expect(result.breakpoints).to.deep.equal([
      {
        path: '/tmp/game/player.gd',
        breakpoints: [{ id: 1, verified: true, line: 56 }],
      },
    ]);
    expect(session.getState()).to.equal('running');
  });

  it('attaches with the same handshake', async () => {
    await session.connect('127.0.0.1', port);
    await session.initialize();
    const result = await session.attachAndConfigure({}, []);

    expect(result.response.command).to.equal('attach');
    expect(server.peers[0].commands()).to.deep.equal([
      'initialize',
      'attach',
      'configurationDone',
    ]);
    expect(session.getState()).to.equal('running');
  });

  it('refuses a second connect', async () => {
    await session.connect('127.0.0.1', port);
    const error = await expectRejection(session.connect('127.0.0.1', port));
    expect(error).to.be.instanceOf(StateError);
  });

  it('reports a refused connection as ConnectionClosedError', async () => {
    const closed = new FakeDapServer(() => undefined);
    const closedPort = await closed.listen();
    await closed.close();

    const error = await expectRejection(session.connect('127.0.0.1', closedPort));
    expect(error).to.be.instanceOf(ConnectionClosedError);
    expect(session.getState()).to.equal('disconnected');
  });

  it('ends in disconnected after disconnect', async () => {
    await session.connect('127.0.0.1', port);
    await session.initialize();
    await session.disconnect();

    expect(session.getState()).to.equal('disconnected');
    expect(server.peers[0].commands()).to.deep.equal(['initialize', 'disconnect']);
  });
});
