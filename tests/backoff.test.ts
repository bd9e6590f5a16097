import assert from 'node:assert/strict';

import { computeBackoffDelay } from '../src/core/backoff';

export function runBackoffTests() {
  const options = { baseMs: 1_000, capMs: 60_000 };

  assert.equal(computeBackoffDelay(0, options, () => 0), 1_000);
  assert.equal(computeBackoffDelay(3, options, () => 0), 8_000);
  assert.equal(computeBackoffDelay(0, options, () => 1), 1_250);
  assert.equal(computeBackoffDelay(1, options, () => 0.5), 2_250);
  assert.equal(computeBackoffDelay(10, options, () => 0), 60_000);
  assert.equal(computeBackoffDelay(10, options, () => 1), 75_000);

  for (let attempt = 0; attempt < 40; attempt += 1) {
    const delay = computeBackoffDelay(attempt, options);
    assert.ok(delay >= Math.min(options.capMs, options.baseMs * 2 ** attempt));
    assert.ok(delay <= options.capMs * 1.25, `attempt ${attempt} waited ${delay}ms`);
  }

  // Out-of-range random sources are clamped.
  assert.equal(computeBackoffDelay(0, options, () => 7), 1_250);
  assert.equal(computeBackoffDelay(-2, options, () => 0), 1_000);
}
