import { vi, afterEach } from "vitest";

// Formatters warn on the console by default; keep test output quiet
global.console = {
	...console,
	log: vi.fn(),
	debug: vi.fn(),
	info: vi.fn(),
	warn: vi.fn(),
	error: vi.fn(),
};

afterEach(() => {
	vi.clearAllMocks();
});
