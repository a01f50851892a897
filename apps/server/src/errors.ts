// Error classes raised inside the server. None of them cross the wire:
// the relay turns frame failures into flagged `detection` replies.

export class DecodeError extends Error {
	constructor(message: string, cause?: unknown) {
		super(message, { cause });
		this.name = 'DecodeError';
	}
}

export class PipelineClosedError extends Error {
	constructor() {
		super('frame pipeline is closed');
		this.name = 'PipelineClosedError';
	}
}

export class FrameTimeoutError extends Error {
	constructor(public timeoutMs: number) {
		super(`inference exceeded ${timeoutMs}ms`);
		this.name = 'FrameTimeoutError';
	}
}

export class ConfigError extends Error {
	constructor(message: string, public variable: string) {
		super(message);
		this.name = 'ConfigError';
	}
}

export function errorMessage(error: unknown): string {
	if (error instanceof Error) return error.message;
	return String(error);
}
