import type { Logger } from './Logger';

// Encoders are silent unless a logger is injected
/* eslint-disable @typescript-eslint/no-empty-function */
export const NULL_LOGGER: Logger = {
	fatal() {},
	error() {},
	warn() {},
	info() {},
	debug() {},
	trace() {},
	log() {},
};
/* eslint-enable @typescript-eslint/no-empty-function */
