export { TraceScreen } from './TraceScreen.js';
export type { TraceScreenProps } from './TraceScreen.js';
export { ErrorScreen } from './ErrorScreen.js';
