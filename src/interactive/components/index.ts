export { Header } from './Header.js';
export { Footer } from './Footer.js';
export type { KeyHintProps } from './Footer.js';
export { Panel } from './Panel.js';
export { SourceSpinner } from './SourceSpinner.js';
export { StatusBar } from './StatusBar.js';
export { RecordLine } from './RecordLine.js';
export { ChannelList } from './ChannelList.js';
