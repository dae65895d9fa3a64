export type ErrorCode =
	| "CONFIG_ERROR"
	| "DB_ERROR"
	| "NETWORK_ERROR"
	| "DEVICE_ERROR"
	| "TIMEOUT_ERROR"
	| "VALIDATION_ERROR"
	| "INTERNAL_ERROR";

export class AppError extends Error {
	public readonly code: ErrorCode;
	public readonly details?: unknown;

	constructor(params: { code: ErrorCode; message: string; details?: unknown; cause?: unknown }) {
		super(params.message, params.cause !== undefined ? { cause: params.cause } : undefined);
		this.name = "AppError";
		this.code = params.code;
		this.details = params.details;
	}
}

export function isAppError(err: unknown, code?: ErrorCode): err is AppError {
	return err instanceof AppError && (code === undefined || err.code === code);
}

export function asAppError(err: unknown): AppError {
	if (err instanceof AppError) {
		return err;
	}

	if (err instanceof Error) {
		return new AppError({
			code: "INTERNAL_ERROR",
			message: err.message,
			cause: err
		});
	}

	return new AppError({
		code: "INTERNAL_ERROR",
		message: "Unknown error",
		details: err
	});
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

export function configError(message: string, details?: unknown): AppError {
	return new AppError({
		code: "CONFIG_ERROR",
		message,
		details
	});
}

export function dbError(message: string, details?: unknown, cause?: unknown): AppError {
	return new AppError({
		code: "DB_ERROR",
		message,
		details,
		cause
	});
}

export function networkError(message: string, details?: unknown, cause?: unknown): AppError {
	return new AppError({
		code: "NETWORK_ERROR",
		message,
		details,
		cause
	});
}

export function deviceError(message: string, details?: unknown, cause?: unknown): AppError {
	return new AppError({
		code: "DEVICE_ERROR",
		message,
		details,
		cause
	});
}

export function timeoutError(message: string, details?: unknown): AppError {
	return new AppError({
		code: "TIMEOUT_ERROR",
		message,
		details
	});
}

export function validationError(message: string, details?: unknown): AppError {
	return new AppError({
		code: "VALIDATION_ERROR",
		message,
		details
	});
}
