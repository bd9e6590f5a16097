import { formatSolarReport } from '../backend/radio/solar';
import { RadioQuery } from '../backend/radio/types';
import { CommandHandler } from './commandTypes';

export function createBandsCommand(radio: RadioQuery): CommandHandler {
  return {
    name: 'bands',
    shortHelp: 'show HAM RF band conditions',
    fullHelp: 'show HAM RF band conditions. Usage: bands',
    usage: 'bands',
    minArgs: 0,
    maxArgs: 0,
    async invoke() {
      const report = await radio.query('solar');
      return ['current band conditions:', ...formatSolarReport(report)];
    },
  };
}

export default createBandsCommand;
