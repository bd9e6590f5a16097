import { XMLParser } from 'fast-xml-parser';
import { UpstreamFormatError } from '../../core/errors';
import { BandCondition, SolarReport } from './types';

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  parseTagValue: false,
  parseAttributeValue: false,
  isArray: (name) => name === 'band',
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function text(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number') return String(value);
  if (isRecord(value)) return text(value['#text']);
  return '';
}

function child(source: unknown, key: string): unknown {
  return isRecord(source) ? source[key] : undefined;
}

/**
 * Parses the solar XML feed into band conditions. Each band needs exactly one
 * `day` and one `night` reading.
 * @throws UpstreamFormatError for documents that do not have that shape.
 */
export function parseSolarXml(xml: string): SolarReport {
  let document: unknown;
  try {
    document = parser.parse(xml);
  } catch (error) {
    throw new UpstreamFormatError(`solar feed is not valid XML: ${error instanceof Error ? error.message : String(error)}`);
  }

  const solarData = child(child(document, 'solar'), 'solardata');
  if (!isRecord(solarData)) {
    throw new UpstreamFormatError('solar feed has no solardata element');
  }

  const rawBands = child(solarData.calculatedconditions, 'band');
  if (!Array.isArray(rawBands)) {
    throw new UpstreamFormatError('solar feed has no calculatedconditions bands');
  }

  const partial = new Map<string, { day?: string; night?: string }>();
  for (const raw of rawBands) {
    const name = text(child(raw, '@_name'));
    const time = text(child(raw, '@_time'));
    const condition = text(raw);
    if (!name) throw new UpstreamFormatError('band entry without a name');

    const entry = partial.get(name) ?? {};
    partial.set(name, entry);

    if (time === 'day' || time === 'night') {
      if (entry[time] !== undefined) {
        throw new UpstreamFormatError(`${time} conditions for band ${name} already set`);
      }
      entry[time] = condition;
    } else {
      throw new UpstreamFormatError(`unknown time ${time} for band ${name}`);
    }
  }

  const bands: BandCondition[] = [];
  for (const [name, entry] of partial) {
    if (entry.day === undefined) throw new UpstreamFormatError(`missing day value for band ${name}`);
    if (entry.night === undefined) throw new UpstreamFormatError(`missing night value for band ${name}`);
    bands.push({ name, day: entry.day, night: entry.night });
  }
  bands.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  return { updated: text(solarData.updated), bands };
}

/**
 * Chat lines for a solar report.
 */
export function formatSolarReport(report: SolarReport): string[] {
  return [
    `updated ${report.updated}`,
    ...report.bands.map((band) => `${band.name} - day: ${band.day}, night: ${band.night}`),
  ];
}
