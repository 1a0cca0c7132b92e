import type { LogObject, Transport } from '../src/index';

export type CapturingTransport = Transport & { logs: LogObject[] };

/**
 * In-memory transport that records every entry it receives.
 */
export function createCapturingTransport(): CapturingTransport {
	const logs: LogObject[] = [];
	return {
		logs,
		write(obj: LogObject) {
			logs.push(obj);
		},
		async flush() {},
		async close() {}
	};
}
