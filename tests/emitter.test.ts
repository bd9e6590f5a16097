import assert from 'node:assert/strict';

import { ResponseEmitter } from '../src/core/emitter';
import { TransportSession } from '../src/core/session';
import { CommandEnvelope, ResponseEnvelope } from '../src/core/types';
import { FakeLink } from './helpers/fakeCore';

class StubHost {
  session?: TransportSession;

  currentSession(): TransportSession | undefined {
    return this.session;
  }
}

async function liveSession(): Promise<{ link: FakeLink; session: TransportSession }> {
  const link = new FakeLink();
  const session = new TransportSession(link, 'test-secret', []);
  await session.connect();
  return { link, session };
}

async function receiveFrom(link: FakeLink, session: TransportSession, command = 'bands'): Promise<CommandEnvelope> {
  link.deliver({ command, arg: '', context: { channelId: '#ham', displayName: 'alice' } });
  const envelope = await session.receive();
  assert.ok(envelope);
  return envelope;
}

function reply(envelope: CommandEnvelope, lines: string[]): ResponseEnvelope {
  return {
    correlationId: envelope.correlationId,
    context: envelope.context,
    payload: { kind: 'ok', lines },
    emittedAt: 0,
  };
}

async function exactlyOnceTest() {
  const host = new StubHost();
  const emitter = new ResponseEmitter(host);
  const { link, session } = await liveSession();
  host.session = session;

  const envelope = await receiveFrom(link, session);
  await emitter.emit(reply(envelope, ['73']));
  await emitter.emit(reply(envelope, ['73 again']));

  assert.deepEqual(link.sent, [{ channelId: '#ham', text: 'alice: 73' }]);
  assert.deepEqual(emitter.stats(), { emitted: 1, dropped: 1 });
  assert.equal(session.pendingCount, 0);

  await emitter.emit({ ...reply(envelope, ['?']), correlationId: 'unknown-id' });
  assert.deepEqual(emitter.stats(), { emitted: 1, dropped: 2 });
}

async function droppedAcrossSessionsTest() {
  const host = new StubHost();
  const emitter = new ResponseEmitter(host);
  const old = await liveSession();
  host.session = old.session;
  const envelope = await receiveFrom(old.link, old.session);

  host.session = undefined;
  await emitter.emit(reply(envelope, ['late']));
  assert.deepEqual(emitter.stats(), { emitted: 0, dropped: 1 });

  // The replacement session never saw the request, so the answer is not sent on it.
  const replacement = await liveSession();
  host.session = replacement.session;
  await emitter.emit(reply(envelope, ['late']));
  assert.deepEqual(replacement.link.sent, []);
  assert.deepEqual(old.link.sent, []);
  assert.deepEqual(emitter.stats(), { emitted: 0, dropped: 2 });
}

async function writeFailureTest() {
  const host = new StubHost();
  const emitter = new ResponseEmitter(host);
  const { link, session } = await liveSession();
  host.session = session;
  const envelope = await receiveFrom(link, session);

  link.sendError = new Error('stream reset');
  await emitter.emit(reply(envelope, ['73']));
  assert.deepEqual(emitter.stats(), { emitted: 0, dropped: 1 });
}

async function serializedWritesTest() {
  const host = new StubHost();
  const emitter = new ResponseEmitter(host);
  const { link, session } = await liveSession();
  host.session = session;
  link.sendDelayMs = 3;

  const first = await receiveFrom(link, session);
  const second = await receiveFrom(link, session, 'pota');
  await Promise.all([
    emitter.emit(reply(first, ['a1', 'a2'])),
    emitter.emit(reply(second, ['b1', 'b2'])),
  ]);

  assert.deepEqual(
    link.sent.map((message) => message.text),
    ['alice: a1', 'a2', 'alice: b1', 'b2'],
  );
  assert.deepEqual(emitter.stats(), { emitted: 2, dropped: 0 });
}

export async function runEmitterTests() {
  await exactlyOnceTest();
  await droppedAcrossSessionsTest();
  await writeFailureTest();
  await serializedWritesTest();
}
