import { CommandRegistry } from '../command-registry.js';
import { USIM_COMMANDS } from './ts-31-102.js';
import { SIM_COMMANDS } from './ts-51-011.js';
import { UICC_COMMANDS } from './ts-102-221.js';

export { SIM_COMMANDS } from './ts-51-011.js';
export { UICC_COMMANDS } from './ts-102-221.js';
export { USIM_COMMANDS } from './ts-31-102.js';

/**
 * Registry of all command sets, merged so that later sets override earlier ones:
 * GSM SIM, then UICC, then USIM
 */
export function createDefaultRegistry(): CommandRegistry {
    return new CommandRegistry('default')
        .merge(new CommandRegistry('TS 51.011', SIM_COMMANDS))
        .merge(new CommandRegistry('TS 102 221', UICC_COMMANDS))
        .merge(new CommandRegistry('TS 31.102', USIM_COMMANDS));
}
