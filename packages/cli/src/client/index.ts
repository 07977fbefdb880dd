export { WpcomClient, WpcomClientOptions, getDomain, parseSite, toBatchResult } from './WpcomClient';
export * from './types';
