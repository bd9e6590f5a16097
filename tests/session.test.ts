import assert from 'node:assert/strict';

import { AuthError, TransportError } from '../src/core/errors';
import { TransportSession } from '../src/core/session';
import { ResponseEnvelope, SessionState } from '../src/core/types';
import { FakeLink } from './helpers/fakeCore';

const REGISTRATIONS = [{ name: 'bands', shortHelp: 'show HAM RF band conditions', fullHelp: 'bands' }];

function okFor(correlationId: string, lines: string[]): ResponseEnvelope {
  return {
    correlationId,
    context: { channelId: '#ham', displayName: 'alice' },
    payload: { kind: 'ok', lines },
    emittedAt: 0,
  };
}

async function connected(link = new FakeLink()): Promise<{ link: FakeLink; session: TransportSession }> {
  const session = new TransportSession(link, 'test-secret', REGISTRATIONS);
  await session.connect();
  return { link, session };
}

async function handshakeTests() {
  const { link, session } = await connected();
  assert.equal(session.state, SessionState.AUTHENTICATED);
  assert.equal(link.token, 'test-secret');
  assert.deepEqual(link.registrations, REGISTRATIONS);
  await assert.rejects(session.connect(), TransportError);

  const rejected = new TransportSession(new FakeLink(new AuthError('bad token', 'invalid-credential')), 'x', []);
  await assert.rejects(rejected.connect(), (error: unknown) => error instanceof AuthError && error.fatal);
  assert.equal(rejected.state, SessionState.CLOSED);

  const broken = new TransportSession(new FakeLink(new Error('socket hang up')), 'x', []);
  await assert.rejects(broken.connect(), (error: unknown) => {
    return error instanceof TransportError && error.message === 'Handshake failed: socket hang up';
  });
}

async function receiveTests() {
  const { link, session } = await connected();

  link.deliver({ command: 'pota', arg: ' 20m  ft8', context: { channelId: '#ham', displayName: 'alice' } });
  link.deliver({ command: 'bands', arg: '', context: { channelId: '#ham' } });

  const first = await session.receive();
  const second = await session.receive();
  assert.ok(first && second);
  assert.equal(first.command, 'pota');
  assert.deepEqual(first.args, ['20m', 'ft8']);
  assert.equal(first.rawArgs, ' 20m  ft8');
  assert.deepEqual(first.context, { channelId: '#ham', displayName: 'alice' });
  assert.notEqual(first.correlationId, second.correlationId);
  assert.ok(Object.isFrozen(first));

  assert.equal(session.pendingCount, 2);
  assert.ok(session.isPending(first.correlationId));
  assert.equal(session.settle(first.correlationId), true);
  assert.equal(session.settle(first.correlationId), false);
  assert.equal(session.settle('never-seen'), false);

  // A waiting reader is woken by the next event.
  const waiting = session.receive();
  link.deliver({ command: 'bands', arg: '', context: { channelId: '#ham' } });
  assert.equal((await waiting)?.command, 'bands');
}

async function sendTests() {
  const { link, session } = await connected();
  await session.send(okFor('c-1', ['current band conditions:', 'updated now']));
  assert.deepEqual(link.sent, [
    { channelId: '#ham', text: 'alice: current band conditions:' },
    { channelId: '#ham', text: 'updated now' },
  ]);

  link.sendError = new Error('deadline exceeded');
  await assert.rejects(session.send(okFor('c-2', ['x'])), TransportError);

  const idle = new TransportSession(new FakeLink(), 'test-secret', []);
  await assert.rejects(idle.send(okFor('c-3', ['x'])), TransportError);
}

async function endOfStreamTests() {
  const { link, session } = await connected();
  link.deliver({ command: 'bands', arg: '', context: { channelId: '#ham' } });
  link.end(new TransportError('connection reset'));

  assert.equal(session.state, SessionState.DRAINING);
  assert.equal(session.closeError?.message, 'connection reset');
  // Already-received envelopes are still handed out.
  assert.equal((await session.receive())?.command, 'bands');
  assert.equal(await session.receive(), undefined);
  assert.equal(session.state, SessionState.CLOSED);
  await assert.rejects(session.send(okFor('c-1', ['late'])), TransportError);

  const closing = await connected();
  const reader = closing.session.receive();
  closing.session.close('test');
  assert.equal(await reader, undefined);
  assert.equal(closing.link.closed, true);
  assert.equal(closing.session.state, SessionState.CLOSED);

  const messages: string[] = [];
  const streaming = await connected();
  streaming.link.deliver({ command: 'bands', arg: '', context: { channelId: '#a' } });
  streaming.link.deliver({ command: 'pota', arg: '20m', context: { channelId: '#b' } });
  streaming.link.end();
  for await (const envelope of streaming.session.messages()) {
    messages.push(envelope.command);
  }
  assert.deepEqual(messages, ['bands', 'pota']);
}

async function closeAfterRemoteEndTests() {
  const { link, session } = await connected();
  const ends: string[] = [];
  session.onEnd(() => ends.push('first'));

  link.end(new TransportError('connection reset'));
  assert.deepEqual(ends, ['first']);
  assert.equal(await session.receive(), undefined);
  assert.equal(session.state, SessionState.CLOSED);
  assert.equal(link.closed, false);

  // The link is still released after the remote side ended the stream.
  session.close('cleanup');
  assert.equal(link.closed, true);
  assert.equal(link.closeCalls, 1);
  session.close('again');
  assert.equal(link.closeCalls, 1);

  // Listeners added after the end fire right away, and only once.
  session.onEnd(() => ends.push('late'));
  assert.deepEqual(ends, ['first', 'late']);

  const local = await connected();
  let localEnds = 0;
  local.session.onEnd(() => {
    localEnds += 1;
  });
  local.session.close('shutdown');
  local.session.close('shutdown');
  assert.equal(localEnds, 1);
  assert.equal(local.link.closeCalls, 1);
}

export async function runSessionTests() {
  await handshakeTests();
  await receiveTests();
  await sendTests();
  await endOfStreamTests();
  await closeAfterRemoteEndTests();
}
