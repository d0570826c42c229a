export { commandSchema } from './commands.js';
export type { Command, ConfirmationResponse } from './commands.js';
export { intentMetadataSchema } from './intent-metadata.js';
export type { IntentMetadataInput, ParsedIntentMetadata } from './intent-metadata.js';
