/**
 * Bot modules exports
 */

export {
  type BotModule,
  type ModuleLoader,
  type ModuleContext,
  type SlashCommand,
  type ModalHandler,
  type RegisteredModule,
  ModuleLoaderImpl,
  ModuleValidationError,
  validateModule,
  createModuleLoader,
  modalCustomId,
} from './loader.js';

export { createGeneralModule } from './general/index.js';
export { createChallengesModule, type ChallengesModule, type ChallengesModuleOptions } from './challenges/index.js';
