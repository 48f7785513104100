export { EnvCredentialProvider, FileCredentialProvider } from './credential-provider.js';
export type { CredentialProvider, FeedCredentials } from './credential-provider.js';
