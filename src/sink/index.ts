export { type ByteSink, writeBytes } from './ByteSink';
export { BufferSink } from './BufferSink';
export { CallbackSink } from './CallbackSink';
