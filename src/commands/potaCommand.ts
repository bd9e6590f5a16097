import { BadArgumentsError } from '../core/errors';
import { DEFAULT_MODE, findActivation, formatActivation, parseBand, parseMode } from '../backend/radio/pota';
import { RadioQuery } from '../backend/radio/types';
import { CommandHandler } from './commandTypes';
import { optionalArg } from './commandUtils';

/**
 * `pota <band> [mode]`: most recent Parks on the Air activation on a band.
 * Arguments are validated before any upstream request is made.
 */
export function createPotaCommand(radio: RadioQuery, now: () => number = Date.now): CommandHandler {
  return {
    name: 'pota',
    shortHelp: 'find most recent POTA activation',
    fullHelp: 'find the most recent Parks on the Air activation. Usage: pota <band> [mode]. Default mode is SSB.',
    usage: 'pota <band> [mode]',
    minArgs: 1,
    maxArgs: 2,
    async invoke(envelope) {
      const [bandArg] = envelope.args;
      const band = parseBand(bandArg);
      if (!band) throw new BadArgumentsError(`unknown band "${bandArg}"`);

      const modeArg = optionalArg(envelope.args, 1);
      const mode = modeArg === undefined ? DEFAULT_MODE : parseMode(modeArg);
      if (!mode) throw new BadArgumentsError(`unknown mode "${modeArg}"`);

      const spots = await radio.query('spots');
      const spot = findActivation(spots, band, mode);
      if (!spot) return [`no activations found on ${band.name} over ${mode}`];
      return [formatActivation(spot, now())];
    },
  };
}

export default createPotaCommand;
