import { expect } from 'chai';
import * as sinon from 'sinon';
import { ProxyConfigOverrides, resolveProxyConfig } from '../../src/config/proxyConfig';
import { BackendUnreachableError } from '../../src/errors';
import { ProxySession, SessionEndPayload } from '../../src/session/proxySession';
import { SessionManager } from '../../src/session/sessionManager';
import { createMockLogger } from '../mocks/mockLogger';
import {
  ADAPTER_FILE,
  SDK_FILE,
  USER_FILE,
  dapFrame,
  delveLocation,
  delveState,
  testClassifier,
} from '../fixtures';
import { FakeBackend, TestClient, startFakeBackend } from './socketHarness';

interface DelveRequest {
  id: number;
  method: string;
  params: Array<{ name?: string }>;
}

const stateReply = (id: number, state: string) => `{"id":${id},"result":{"State":${state}},"error":null}`;

describe('SessionManager', () => {
  let backend: FakeBackend | undefined;
  let manager: SessionManager | undefined;
  let client: TestClient | undefined;

  afterEach(async () => {
    client?.destroy();
    await manager?.close();
    await backend?.close();
    client = undefined;
    manager = undefined;
    backend = undefined;
  });

  async function startProxy(
    backendPort: number,
    connectBackend?: ConstructorParameters<typeof SessionManager>[3],
    overrides: ProxyConfigOverrides = {},
  ): Promise<{ manager: SessionManager; port: number }> {
    const config = resolveProxyConfig({
      listenPort: 0,
      backendPort,
      dialRetries: 2,
      dialDelayMs: 1,
      autoStep: { pollDelayMs: 1, requestTimeoutMs: 1000 },
      ...overrides,
    });
    const created = new SessionManager(config, testClassifier(), createMockLogger(), connectBackend);
    const address = await created.listen();
    return { manager: created, port: address.port };
  }

  describe('JSON-RPC sessions', () => {
    it('filters stack traces on the way to the client', async () => {
      backend = await startFakeBackend('bare', (body) => {
        const request: DelveRequest = JSON.parse(body);
        return [
          `{"id":${request.id},"result":{"Locations":[${delveLocation(USER_FILE, 20)},${delveLocation(SDK_FILE, 300)}]},"error":null}`,
        ];
      });
      const proxy = await startProxy(backend.port);
      manager = proxy.manager;
      const started = new Promise<ProxySession>((resolve) => proxy.manager.once('sessionStarted', resolve));

      client = await TestClient.connect(proxy.port, 'bare');
      client.send('{"method":"RPCServer.Stacktrace","params":[{"Id":1,"Depth":50}],"id":21}');

      const [reply] = await client.waitForMessages(1);
      expect(reply).to.equal(
        `{"id":21,"result":{"Locations":[${delveLocation(USER_FILE, 20)}]},"error":null}`,
      );
      const session = await started;
      expect(session.format).to.equal('bare');
      expect(session.state.frames.entries()).to.deep.equal([[0, 0]]);
      expect(backend.received).to.deep.equal([
        '{"method":"RPCServer.Stacktrace","params":[{"Id":1,"Depth":50}],"id":21}',
      ]);
    });

    it('answers a step into adapter code with the user-code state only', async () => {
      const steps = [delveState(USER_FILE, 20), delveState(USER_FILE, 21)];
      backend = await startFakeBackend('bare', (body) => {
        const request: DelveRequest = JSON.parse(body);
        if (request.method === 'RPCServer.Command' && request.id === 7) {
          return [stateReply(7, delveState(ADAPTER_FILE, 104))];
        }
        if (request.method === 'RPCServer.Command') {
          return [stateReply(request.id, steps.shift() ?? 'null')];
        }
        return [stateReply(request.id, delveState(USER_FILE, 21))];
      });
      const proxy = await startProxy(backend.port);
      manager = proxy.manager;

      client = await TestClient.connect(proxy.port, 'bare');
      client.send('{"method":"RPCServer.Command","params":[{"name":"next"}],"id":7}');
      const [stepReply] = await client.waitForMessages(1);
      client.send('{"method":"RPCServer.State","params":[{"NonBlocking":true}],"id":8}');
      const messages = await client.waitForMessages(2);

      expect(stepReply).to.equal(stateReply(7, delveState(USER_FILE, 21)));
      expect(messages[1]).to.equal(stateReply(8, delveState(USER_FILE, 21)));
      expect(backend.received).to.deep.equal([
        '{"method":"RPCServer.Command","params":[{"name":"next"}],"id":7}',
        '{"id":90000,"method":"RPCServer.Command","params":[{"name":"next"}]}',
        '{"id":90001,"method":"RPCServer.Command","params":[{"name":"next"}]}',
        '{"method":"RPCServer.State","params":[{"NonBlocking":true}],"id":8}',
      ]);
    });
  });

  it('forwards a burst larger than the per-push limit in full', async () => {
    backend = await startFakeBackend('bare', (body) => {
      const request: DelveRequest = JSON.parse(body);
      return [stateReply(request.id, delveState(USER_FILE, request.id))];
    });
    const proxy = await startProxy(backend.port, undefined, { backpressure: { maxMessagesPerPush: 2 } });
    manager = proxy.manager;
    const ids = [1, 2, 3, 4, 5];

    client = await TestClient.connect(proxy.port, 'bare');
    client.send(ids.map((id) => `{"method":"RPCServer.State","params":[{}],"id":${id}}`).join(''));

    const replies = await client.waitForMessages(ids.length);
    expect(replies).to.deep.equal(ids.map((id) => stateReply(id, delveState(USER_FILE, id))));
    expect(backend.received.map((body) => JSON.parse(body).id)).to.deep.equal(ids);
  });

  describe('DAP sessions', () => {
    it('detects the framed format and filters stackTrace responses', async () => {
      backend = await startFakeBackend('framed', (body) => {
        const request: { seq: number; command: string } = JSON.parse(body);
        if (request.command === 'stackTrace') {
          return [
            `{"seq":50,"type":"response","request_seq":${request.seq},"success":true,"command":"stackTrace","body":{"stackFrames":[${dapFrame(1000, USER_FILE, 20)},${dapFrame(1001, SDK_FILE, 300)}],"totalFrames":2}}`,
          ];
        }
        return [
          `{"seq":49,"type":"response","request_seq":${request.seq},"success":true,"command":"${request.command}"}`,
        ];
      });
      const proxy = await startProxy(backend.port);
      manager = proxy.manager;

      client = await TestClient.connect(proxy.port, 'framed');
      client.send('{"seq":1,"type":"request","command":"initialize","arguments":{"adapterID":"go"}}');
      client.send('{"seq":2,"type":"request","command":"stackTrace","arguments":{"threadId":1}}');

      expect(await client.waitForMessages(2)).to.deep.equal([
        '{"seq":49,"type":"response","request_seq":1,"success":true,"command":"initialize"}',
        `{"seq":50,"type":"response","request_seq":2,"success":true,"command":"stackTrace","body":{"stackFrames":[${dapFrame(1000, USER_FILE, 20)}],"totalFrames":1}}`,
      ]);
    });
  });

  describe('lifecycle', () => {
    it('closes the client when the backend cannot be reached', async () => {
      const connect = sinon.stub().rejects(new Error('connect ECONNREFUSED'));
      const proxy = await startProxy(1, connect);
      manager = proxy.manager;
      const rejected = new Promise<Error>((resolve) => proxy.manager.once('sessionRejected', resolve));

      client = await TestClient.connect(proxy.port, 'bare');
      client.send('{"method":"RPCServer.State","params":[{}],"id":1}');

      const error = await rejected;
      await client.closed;
      expect(error).to.be.instanceOf(BackendUnreachableError);
      expect(connect.callCount).to.equal(2);
      expect(proxy.manager.activeSessionCount).to.equal(0);
    });

    it('ends the session when the backend goes away and accepts a new client', async () => {
      backend = await startFakeBackend('bare', (body) => {
        const request: DelveRequest = JSON.parse(body);
        return [stateReply(request.id, delveState(USER_FILE, 1))];
      });
      const fakeBackend = backend;
      const proxy = await startProxy(backend.port);
      manager = proxy.manager;
      const ended = new Promise<SessionEndPayload>((resolve) => proxy.manager.once('sessionEnded', resolve));

      client = await TestClient.connect(proxy.port, 'bare');
      client.send('{"method":"RPCServer.State","params":[{}],"id":1}');
      await client.waitForMessages(1);
      expect(proxy.manager.activeSessionCount).to.equal(1);

      fakeBackend.dropConnections();
      const payload = await ended;
      await client.closed;

      expect(payload.sessionId).to.equal('session-1');
      expect(payload.reason).to.match(/^backend /);
      expect(payload.stats.requests).to.equal(1);
      expect(payload.stats.responses).to.equal(1);
      expect(proxy.manager.activeSessionCount).to.equal(0);

      const second = await TestClient.connect(proxy.port, 'bare');
      client = second;
      second.send('{"method":"RPCServer.State","params":[{}],"id":2}');
      expect(await second.waitForMessages(1)).to.deep.equal([stateReply(2, delveState(USER_FILE, 1))]);
    });

    it('drops a client that sends only whitespace past the buffer limit', async () => {
      backend = await startFakeBackend('bare', () => []);
      const proxy = await startProxy(backend.port, undefined, { backpressure: { maxBufferedBytes: 16 } });
      manager = proxy.manager;
      const started = sinon.spy();
      proxy.manager.on('sessionStarted', started);

      client = await TestClient.connect(proxy.port, 'bare');
      client.send(' \n'.repeat(20));

      await client.closed;
      expect(started.called).to.equal(false);
      expect(proxy.manager.activeSessionCount).to.equal(0);
      expect(backend.received).to.be.empty;
    });

    it('ends a session that outlives its timeout', async () => {
      backend = await startFakeBackend('bare', () => []);
      const proxy = await startProxy(backend.port, undefined, { sessionTimeoutMs: 50 });
      manager = proxy.manager;
      const ended = new Promise<SessionEndPayload>((resolve) => proxy.manager.once('sessionEnded', resolve));

      client = await TestClient.connect(proxy.port, 'bare');
      client.send('{"method":"RPCServer.State","params":[{}],"id":1}');

      expect((await ended).reason).to.equal('session timeout');
      await client.closed;
    });
  });
});
