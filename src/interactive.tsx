export { runInteractive, App, TraceScreen, ErrorScreen } from './interactive/index.js';
export type { AppProps, TraceScreenProps } from './interactive/index.js';
