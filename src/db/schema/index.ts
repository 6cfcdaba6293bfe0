export { tokenOwners } from './token-owners';
export { serviceTokens } from './service-tokens';
export { stateUris } from './state-uris';
export { registryEvents } from './registry-events';
