import { RadioUpstream } from '../../src/backend/radio/radioUpstream';
import { SolarReport, Spot } from '../../src/backend/radio/types';

type Outcome<T> = T | Error;

/**
 * Scripted upstream. Each call takes the next outcome from its queue, repeating the last one.
 */
export class FakeUpstream implements RadioUpstream {
  solarCalls = 0;
  spotsCalls = 0;
  /** When set, calls wait for this promise before answering. */
  gate?: Promise<void>;

  constructor(
    private readonly solar: Array<Outcome<SolarReport>> = [sampleSolar()],
    private readonly spots: Array<Outcome<Spot[]>> = [sampleSpots()],
  ) {}

  async fetchSolar(): Promise<SolarReport> {
    this.solarCalls += 1;
    if (this.gate) await this.gate;
    return settle(this.solar);
  }

  async fetchSpots(): Promise<Spot[]> {
    this.spotsCalls += 1;
    if (this.gate) await this.gate;
    return settle(this.spots);
  }
}

function settle<T>(queue: Array<Outcome<T>>): T {
  const next = queue.length > 1 ? queue.shift() : queue[0];
  if (next === undefined) throw new Error('no scripted outcome');
  if (next instanceof Error) throw next;
  return next;
}

/** Manually advanced clock; `sleep` moves time forward instead of waiting. */
export class FakeClock {
  readonly sleeps: number[] = [];

  constructor(public current = Date.parse('2026-10-18T22:00:00Z')) {}

  readonly now = (): number => this.current;

  readonly sleep = async (ms: number): Promise<void> => {
    this.sleeps.push(ms);
    this.current += ms;
  };

  advance(ms: number): void {
    this.current += ms;
  }
}

export function sampleSolar(): SolarReport {
  return {
    updated: '18 Oct 2026 2145 GMT',
    bands: [
      { name: '12m-10m', day: 'Poor', night: 'Poor' },
      { name: '80m-40m', day: 'Fair', night: 'Good' },
    ],
  };
}

export function sampleSpots(): Spot[] {
  return [
    {
      activator: 'K0ABC',
      name: 'Rocky Ridge State Park',
      locationDesc: 'US-CO',
      mode: 'FT8',
      frequencyHz: 14_074_000,
      spotTime: new Date('2026-10-18T21:59:30Z'),
    },
    {
      activator: 'W1XYZ',
      name: 'Pine Lake Forest',
      locationDesc: 'US-ME',
      mode: 'SSB',
      frequencyHz: 7_185_500,
      spotTime: new Date('2026-10-18T21:59:15Z'),
    },
  ];
}
