import assert from 'node:assert/strict';

import {
  decodeEvent,
  encodeRegistrations,
  encodeSendMessage,
  errorText,
  renderResponse,
  splitArgs,
} from '../src/core/codec';
import { ResponseEnvelope } from '../src/core/types';

function response(payload: ResponseEnvelope['payload'], displayName?: string): ResponseEnvelope {
  return {
    correlationId: 'c-1',
    context: { channelId: '#ham', displayName },
    payload,
    emittedAt: 0,
  };
}

export function runCodecTests() {
  assert.deepEqual(splitArgs('  20m   ft8 '), ['20m', 'ft8']);
  assert.deepEqual(splitArgs(''), []);
  assert.deepEqual(splitArgs(undefined), []);

  const decoded = decodeEvent({
    inner: 'command',
    command: {
      source: { channel_id: '#ham', user: { id: 'u-1', display_name: 'alice' } },
      command: 'pota',
      arg: '20m ft8',
    },
  });
  assert.deepEqual(decoded, {
    command: 'pota',
    arg: '20m ft8',
    context: { channelId: '#ham', userId: 'u-1', displayName: 'alice' },
  });

  assert.equal(decodeEvent({ inner: 'message', message: { text: 'hi' } }), undefined);
  assert.equal(decodeEvent({ command: { command: 'bands', source: {} } }), undefined);
  assert.equal(decodeEvent({ command: { command: '', source: { channel_id: '#ham' } } }), undefined);
  assert.equal(decodeEvent('not an event'), undefined);
  assert.deepEqual(decodeEvent({ command: { command: 'bands', source: { channel_id: '#ham' } } }), {
    command: 'bands',
    arg: '',
    context: { channelId: '#ham' },
  });

  assert.deepEqual(encodeRegistrations([{ name: 'bands', shortHelp: 'short', fullHelp: 'full' }]), {
    commands: { bands: { name: 'bands', short_help: 'short', full_help: 'full' } },
  });
  assert.deepEqual(encodeSendMessage('#ham', 'hello'), { channel_id: '#ham', text: 'hello' });

  assert.deepEqual(renderResponse(response({ kind: 'ok', lines: ['one', 'two'] }, 'alice')), ['alice: one', 'two']);
  assert.deepEqual(renderResponse(response({ kind: 'ok', lines: ['one'] })), ['one']);
  assert.deepEqual(renderResponse(response({ kind: 'ok', lines: [] }, 'alice')), []);
  assert.deepEqual(
    renderResponse(response({ kind: 'error', error: { code: 'rate-limited', message: 'bucket empty' } }, 'bob')),
    ['bob: too many requests right now, try again later'],
  );

  assert.equal(errorText({ code: 'unknown-command', message: 'unknown command "qrz"' }), 'unknown command "qrz"');
  assert.equal(errorText({ code: 'bad-arguments', message: 'unknown band "11m"' }), 'unknown band "11m"');
  assert.equal(
    errorText({ code: 'upstream-unavailable', message: 'spots data unavailable' }),
    'radio data service unavailable, try again later',
  );
  assert.equal(errorText({ code: 'timeout', message: 'x' }), 'command timed out');
  assert.equal(errorText({ code: 'internal', message: 'TypeError: boom' }), 'something went wrong');
}
