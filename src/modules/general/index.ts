/**
 * General Module
 * Built-in prefix commands (!ping, !echo)
 */

import { builtinCommands } from '../../commands/index.js';
import type { BotModule } from '../loader.js';

export function createGeneralModule(): BotModule {
  return {
    name: 'general',
    enabled: true,
    commands: [...builtinCommands],
  };
}
