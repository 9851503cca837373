export * from './config';
export * from './session';
export * from './target';
export * from './helpers';
export { TelnetDecoder } from './telnet-codec';
