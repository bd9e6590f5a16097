import logger from '../../utils/logger';
import { UpstreamFormatError } from '../../core/errors';
import { matchName } from '../../commands/commandUtils';
import { Spot } from './types';

export const MODES = ['FT4', 'FT8', 'SSB', 'USB', 'LSB', 'CW', 'FM', 'RTTY', 'C4FM', 'PSK31', 'DSTAR'] as const;
export type Mode = (typeof MODES)[number];

export const DEFAULT_MODE: Mode = 'SSB';

export interface Band {
  name: string;
  lowHz: number;
  highHz: number;
}

/** Amateur allocations (IARU region 2), inclusive ranges in Hz. */
export const BANDS: readonly Band[] = Object.freeze([
  { name: '160m', lowHz: 1_800_000, highHz: 2_000_000 },
  { name: '80m', lowHz: 3_500_000, highHz: 4_000_000 },
  { name: '60m', lowHz: 5_330_500, highHz: 5_406_500 },
  { name: '40m', lowHz: 7_000_000, highHz: 7_300_000 },
  { name: '30m', lowHz: 10_100_000, highHz: 10_150_000 },
  { name: '20m', lowHz: 14_000_000, highHz: 14_350_000 },
  { name: '17m', lowHz: 18_068_000, highHz: 18_168_000 },
  { name: '15m', lowHz: 21_000_000, highHz: 21_450_000 },
  { name: '12m', lowHz: 24_890_000, highHz: 24_990_000 },
  { name: '10m', lowHz: 28_000_000, highHz: 29_700_000 },
  { name: '6m', lowHz: 50_000_000, highHz: 54_000_000 },
  { name: '2m', lowHz: 144_000_000, highHz: 148_000_000 },
]);

export function parseBand(value: string): Band | undefined {
  const lower = value.trim().toLowerCase();
  return BANDS.find((band) => band.name === lower);
}

export function parseMode(value: string): Mode | undefined {
  return matchName(value, MODES);
}

export function bandContains(band: Band, frequencyHz: number): boolean {
  return frequencyHz >= band.lowHz && frequencyHz <= band.highHz;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringValue(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number') return String(value);
  return '';
}

/** Spot frequencies are published in kHz; we keep whole Hz. */
export function parseFrequencyKhz(value: string): number | undefined {
  const khz = Number.parseFloat(value);
  if (!Number.isFinite(khz) || khz <= 0) return undefined;
  return Math.floor(khz * 1_000);
}

/** Spot times are naive UTC timestamps (`YYYY-MM-DDTHH:MM:SS`). */
export function parseSpotTime(value: string): Date | undefined {
  if (!/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}$/.test(value)) return undefined;
  const parsed = new Date(`${value}Z`);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
}

/**
 * Validates the spots feed. Entries that cannot be interpreted are skipped.
 * @throws UpstreamFormatError when the payload is not a list.
 */
export function parseSpots(payload: unknown): Spot[] {
  if (!Array.isArray(payload)) {
    throw new UpstreamFormatError('spots feed is not a list');
  }

  const spots: Spot[] = [];
  let skipped = 0;
  for (const raw of payload) {
    if (!isRecord(raw)) {
      skipped += 1;
      continue;
    }
    const frequencyHz = parseFrequencyKhz(stringValue(raw.frequency));
    const spotTime = parseSpotTime(stringValue(raw.spotTime));
    if (frequencyHz === undefined || spotTime === undefined) {
      skipped += 1;
      continue;
    }
    spots.push({
      activator: stringValue(raw.activator),
      name: stringValue(raw.name),
      locationDesc: stringValue(raw.locationDesc),
      mode: stringValue(raw.mode).toUpperCase(),
      frequencyHz,
      spotTime,
    });
  }

  if (skipped > 0) {
    logger.debug(`[Pota] Skipped ${skipped} malformed spot(s)`);
  }
  return spots;
}

/**
 * First spot (feed order, newest first) on the band using the mode.
 */
export function findActivation(spots: readonly Spot[], band: Band, mode: Mode): Spot | undefined {
  return spots.find((spot) => spot.mode === mode && bandContains(band, spot.frequencyHz));
}

/** `14.074`, `7.185.5` for a 500 Hz offset. */
export function formatFrequency(frequencyHz: number): string {
  const mhz = Math.floor(frequencyHz / 1_000_000);
  const khz = Math.floor((frequencyHz % 1_000_000) / 1_000);
  const hz = frequencyHz % 1_000;
  return `${mhz}.${String(khz).padStart(3, '0')}${hz === 500 ? '.5' : ''}`;
}

/** `45s`, or `3m7s` above a minute. */
export function formatAge(ageMs: number): string {
  const seconds = Math.floor(Math.abs(ageMs) / 1_000);
  if (seconds > 60) return `${Math.floor(seconds / 60)}m${seconds % 60}s`;
  return `${seconds}s`;
}

/** `2026-10-18 21:59:30 UTC` */
export function formatSpotTime(time: Date): string {
  return `${time.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

export function formatActivation(spot: Spot, now: number): string {
  const age = formatAge(now - spot.spotTime.getTime());
  return (
    `[time:${formatSpotTime(spot.spotTime)},age:${age}] ` +
    `${formatFrequency(spot.frequencyHz)}MHz ${spot.mode}, ${spot.locationDesc} - ${spot.name} (${spot.activator})`
  );
}
