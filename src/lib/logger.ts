export type Logger = {
	info: (message: string) => void;
	verbose: (message: string) => void;
	warn: (message: string) => void;
};

export type ConsoleLoggerOptions = {
	verbose?: boolean;
	// Keeps stdout clean for machine-readable output.
	jsonOutput?: boolean;
};

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
	const write = (message: string) => {
		if (options.jsonOutput) {
			console.error(message);
			return;
		}
		console.log(message);
	};

	return {
		info: write,
		verbose: (message) => {
			if (options.verbose) {
				write(`[verbose] ${message}`);
			}
		},
		warn: (message) => {
			console.error(`Warning: ${message}`);
		},
	};
}

export function createSilentLogger(): Logger {
	return {
		info: () => {},
		verbose: () => {},
		warn: () => {},
	};
}

export type RecordedLog = { level: keyof Logger; message: string };

export function createRecordingLogger(): Logger & { entries: RecordedLog[] } {
	const entries: RecordedLog[] = [];
	return {
		entries,
		info: (message) => entries.push({ level: "info", message }),
		verbose: (message) => entries.push({ level: "verbose", message }),
		warn: (message) => entries.push({ level: "warn", message }),
	};
}
