import { Logger } from '@querygate/logging';
import { afterAll, afterEach } from 'vitest';

// Global logger settings must not leak between tests
afterEach(() => {
	Logger.reset();
});

afterAll(async () => {
	await Logger.shutdown();
});
