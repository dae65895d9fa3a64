import axios from "axios";
import type { AxiosInstance } from "axios";
import { ActuatorCommandSchema } from "@regen-controller/common";
import type { ActuatorCommand } from "@regen-controller/common";
import type winston from "winston";

import { errorMessage, networkError, validationError } from "../lib/errors";

export interface ActuatorClientOptions {
	baseUrl: string;
	timeoutMs?: number;
	logger: winston.Logger;
	// Injected in tests to swap the transport
	http?: AxiosInstance;
}

/**
 * The remote heater/fan controller.
 *
 * Every call resolves with the HTTP status code; only transport failures
 * (refused, timeout, DNS) reject, as NETWORK_ERROR AppErrors.
 */
export interface Actuator {
	// An aborted signal cancels the request in flight (NETWORK_ERROR)
	sendAuto(cmd: ActuatorCommand, signal?: AbortSignal): Promise<number>;
	stop(): Promise<number>;
	emergencyShutdown(): Promise<number>;
}

export class ActuatorClient implements Actuator {
	private readonly http: AxiosInstance;
	private readonly logger: winston.Logger;

	constructor(opts: ActuatorClientOptions) {
		this.logger = opts.logger;
		this.http =
			opts.http ??
			axios.create({
				baseURL: opts.baseUrl,
				timeout: opts.timeoutMs ?? 2000
			});
	}

	private async request(method: "GET" | "POST", url: string, data?: unknown, signal?: AbortSignal): Promise<number> {
		try {
			const res = await this.http.request({
				method,
				url,
				data,
				signal,
				// Status handling is the caller's business
				validateStatus: () => true
			});
			this.logger.debug("%s %s -> %d", method, url, res.status);
			return res.status;
		} catch (err) {
			throw networkError(`${method} ${url} failed: ${errorMessage(err)}`, { method, url }, err);
		}
	}

	async sendAuto(cmd: ActuatorCommand, signal?: AbortSignal): Promise<number> {
		const res = ActuatorCommandSchema.safeParse(cmd);
		if (!res.success) {
			throw validationError(`Invalid actuator command: ${res.error.issues.map(i => i.message).join("; ")}`, cmd);
		}
		return this.request("POST", "/auto", res.data, signal);
	}

	stop(): Promise<number> {
		return this.request("GET", "/stop");
	}

	emergencyShutdown(): Promise<number> {
		return this.request("GET", "/emergency_shutdown");
	}
}
