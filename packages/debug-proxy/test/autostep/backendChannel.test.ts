import { expect } from 'chai';
import * as sinon from 'sinon';
import { BackendChannel } from '../../src/autostep/backendChannel';
import { InternalRequestError } from '../../src/errors';
import { JsonRpcDialect } from '../../src/protocol/jsonRpcDialect';
import { DapDialect } from '../../src/protocol/dapDialect';
import { createMockLogger } from '../mocks/mockLogger';
import { decodeResponse, framedMessage, testClassifier } from '../fixtures';

async function rejection(promise: Promise<unknown>): Promise<InternalRequestError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof InternalRequestError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected the promise to reject');
}

describe('BackendChannel', () => {
  const dialect = new JsonRpcDialect(testClassifier());
  let writes: string[];
  let channel: BackendChannel;

  beforeEach(() => {
    writes = [];
    channel = new BackendChannel(dialect, (bytes) => writes.push(bytes.toString('utf8')), createMockLogger(), 1000);
  });

  afterEach(() => {
    channel.close('test finished');
  });

  it('writes requests with reserved ids and resolves on the reply', async () => {
    const pending = channel.request('RPCServer.State', { NonBlocking: true });

    expect(writes).to.deep.equal(['{"id":90000,"method":"RPCServer.State","params":[{"NonBlocking":true}]}']);
    expect(channel.pendingCount).to.equal(1);

    const delivered = channel.deliver(decodeResponse(dialect, '{"id":90000,"result":{"State":{}},"error":null}'));
    const response = await pending;

    expect(delivered).to.equal(true);
    expect(response.id).to.equal('90000');
    expect(channel.pendingCount).to.equal(0);
  });

  it('ignores replies nobody waits for', () => {
    expect(channel.deliver(decodeResponse(dialect, '{"id":90500,"result":{},"error":null}'))).to.equal(false);
  });

  it('rejects with the backend error', async () => {
    const pending = channel.request('RPCServer.Command', { name: 'next' });
    channel.deliver(decodeResponse(dialect, '{"id":90000,"result":null,"error":"not stopped"}'));

    const error = await rejection(pending);
    expect(error.failure).to.equal('backend-error');
    expect(error.method).to.equal('RPCServer.Command');
  });

  it('times out requests that get no reply', async () => {
    const clock = sinon.useFakeTimers();
    try {
      const pending = channel.request('RPCServer.State', {}, 50);
      clock.tick(50);

      const error = await rejection(pending);
      expect(error.failure).to.equal('timeout');
      expect(error.requestId).to.equal('90000');
      expect(channel.pendingCount).to.equal(0);
    } finally {
      clock.restore();
    }
  });

  it('rejects outstanding and later requests once closed', async () => {
    const pending = channel.request('RPCServer.State', {});
    channel.close('backend disconnected');

    const error = await rejection(pending);
    expect(error.failure).to.equal('closed');
    expect(error.message).to.contain('backend disconnected');

    const late = await rejection(channel.request('RPCServer.State', {}));
    expect(late.failure).to.equal('closed');
    expect(writes).to.have.lengthOf(1);
  });

  it('rolls ids over within the reserved range, skipping ids in flight', () => {
    for (let i = 0; i < 1000; i++) {
      channel.request('RPCServer.State', {}, 0).catch(() => undefined);
    }
    expect(writes[999]).to.contain('"id":90999');

    channel.deliver(decodeResponse(dialect, '{"id":90005,"result":{},"error":null}'));
    channel.request('RPCServer.State', {}, 0).catch(() => undefined);

    expect(writes[1000]).to.contain('"id":90005');
  });

  it('rejects the request when the write fails', async () => {
    const broken = new BackendChannel(
      dialect,
      () => {
        throw new Error('socket closed');
      },
      createMockLogger(),
    );
    const error = await rejection(broken.request('RPCServer.State', {}));
    expect(error.failure).to.equal('closed');
    expect(broken.pendingCount).to.equal(0);
  });

  describe('event capture', () => {
    const dap = new DapDialect();
    const event = (name: string) => {
      const envelope = dap.decode(framedMessage(`{"seq":1,"type":"event","event":"${name}","body":{"threadId":1}}`));
      if (envelope?.kind !== 'event') {
        throw new Error('expected an event');
      }
      return envelope;
    };

    it('lets events through when not capturing', () => {
      expect(channel.offerEvent(event('stopped'))).to.equal(false);
    });

    it('captures stop and continue events only', () => {
      channel.beginCapture();
      expect(channel.offerEvent(event('output'))).to.equal(false);
      expect(channel.offerEvent(event('continued'))).to.equal(true);
      expect(channel.offerEvent(event('stopped'))).to.equal(true);
      channel.endCapture();
      expect(channel.offerEvent(event('stopped'))).to.equal(false);
    });

    it('hands over a stop that arrived before the wait', async () => {
      channel.beginCapture();
      const stopped = event('stopped');
      channel.offerEvent(stopped);

      expect(await channel.waitForEvent('stopped')).to.equal(stopped);
    });

    it('resolves a waiter when the stop arrives', async () => {
      channel.beginCapture();
      const waiting = channel.waitForEvent('stopped');
      const stopped = event('stopped');
      channel.offerEvent(stopped);

      expect(await waiting).to.equal(stopped);
    });

    it('rejects a waiter on close', async () => {
      channel.beginCapture();
      const waiting = channel.waitForEvent('stopped');
      channel.close('client disconnected');

      const error = await rejection(waiting);
      expect(error.failure).to.equal('closed');
      expect(channel.isCapturing).to.equal(false);
    });
  });
});
