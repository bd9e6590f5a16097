import assert from 'node:assert/strict';

import { RadioQuery, RadioQueryKey, RadioQueryResults } from '../src/backend/radio/types';
import { createBandsCommand } from '../src/commands/bandsCommand';
import { createPotaCommand } from '../src/commands/potaCommand';
import { checkArity, matchName, optionalArg } from '../src/commands/commandUtils';
import { BadArgumentsError } from '../src/core/errors';
import { CommandEnvelope } from '../src/core/types';
import { sampleSolar, sampleSpots } from './helpers/fakeRadio';

class StubRadio implements RadioQuery {
  readonly queries: RadioQueryKey[] = [];
  private readonly results: RadioQueryResults = { solar: sampleSolar(), spots: sampleSpots() };

  query<K extends RadioQueryKey>(key: K): Promise<RadioQueryResults[K]> {
    this.queries.push(key);
    return Promise.resolve(this.results[key]);
  }
}

function envelope(command: string, args: string[]): CommandEnvelope {
  return {
    correlationId: 'c-1',
    command,
    args,
    rawArgs: args.join(' '),
    context: { channelId: '#ham' },
    receivedAt: 0,
  };
}

const NOW = Date.parse('2026-10-18T22:02:37Z');

async function bandsTests() {
  const radio = new StubRadio();
  const bands = createBandsCommand(radio);
  assert.equal(bands.minArgs, 0);
  assert.equal(bands.maxArgs, 0);
  assert.deepEqual(await bands.invoke(envelope('bands', [])), [
    'current band conditions:',
    'updated 18 Oct 2026 2145 GMT',
    '12m-10m - day: Poor, night: Poor',
    '80m-40m - day: Fair, night: Good',
  ]);
  assert.deepEqual(radio.queries, ['solar']);
}

async function potaTests() {
  const radio = new StubRadio();
  const pota = createPotaCommand(radio, () => NOW);

  assert.deepEqual(await pota.invoke(envelope('pota', ['20m', 'ft8'])), [
    '[time:2026-10-18 21:59:30 UTC,age:3m7s] 14.074MHz FT8, US-CO - Rocky Ridge State Park (K0ABC)',
  ]);
  assert.deepEqual(await pota.invoke(envelope('pota', ['40M'])), [
    '[time:2026-10-18 21:59:15 UTC,age:3m22s] 7.185.5MHz SSB, US-ME - Pine Lake Forest (W1XYZ)',
  ]);
  assert.deepEqual(await pota.invoke(envelope('pota', ['2m'])), ['no activations found on 2m over SSB']);
  assert.deepEqual(await pota.invoke(envelope('pota', ['20m', 'cw'])), ['no activations found on 20m over CW']);
  assert.equal(radio.queries.length, 4);

  await assert.rejects(
    pota.invoke(envelope('pota', ['11m'])),
    (error: unknown) => error instanceof BadArgumentsError && error.message === 'unknown band "11m"',
  );
  await assert.rejects(
    pota.invoke(envelope('pota', ['20m', 'am'])),
    (error: unknown) => error instanceof BadArgumentsError && error.message === 'unknown mode "am"',
  );
  // Invalid arguments never reach the upstream.
  assert.equal(radio.queries.length, 4);
}

function utilityTests() {
  const pota = createPotaCommand(new StubRadio());
  assert.equal(checkArity(pota, 0), 'invalid pota command. Usage: pota <band> [mode]');
  assert.equal(checkArity(pota, 1), undefined);
  assert.equal(checkArity(pota, 2), undefined);
  assert.equal(checkArity(pota, 3), 'invalid pota command. Usage: pota <band> [mode]');

  assert.equal(optionalArg(['20m'], 1), undefined);
  assert.equal(optionalArg(['20m', 'cw'], 1), 'cw');
  assert.equal(matchName('psk31', ['FT8', 'PSK31'] as const), 'PSK31');
  assert.equal(matchName('ssb ', ['FT8', 'PSK31'] as const), undefined);
}

export async function runCommandTests() {
  await bandsTests();
  await potaTests();
  utilityTests();
}
