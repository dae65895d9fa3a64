import ModbusRTU from "modbus-serial";
import type winston from "winston";

import { deviceError, errorMessage } from "../lib/errors";
import type { RegisterReader } from "./types";

export interface SerialOptions {
	baudRate: number;
	timeoutMs: number;
}

/**
 * One Modbus RTU connection on a serial port. Several slaves share it; the
 * caller must hold the port in the BusArbiter around every `readFloat`, since
 * the slave id is client state.
 */
class ModbusRtuLink implements RegisterReader {
	constructor(
		readonly port: string,
		private readonly client: ModbusRTU
	) {}

	async readFloat(slaveId: number, register: number, functionCode: 3 | 4): Promise<number> {
		this.client.setID(slaveId);

		const res =
			functionCode === 4
				? await this.client.readInputRegisters(register, 2)
				: await this.client.readHoldingRegisters(register, 2);

		if (res.buffer.length < 4) {
			throw deviceError(`short response from slave ${slaveId} register ${register}`);
		}
		// Big-endian IEEE-754 across two registers, high word first
		return res.buffer.readFloatBE(0);
	}

	close(): Promise<void> {
		return new Promise<void>(resolve => {
			if (!this.client.isOpen) return resolve();
			this.client.close(() => resolve());
		});
	}
}

/**
 * Hands out one shared link per serial port, opened on first request.
 */
export class ModbusPortPool {
	private readonly links = new Map<string, Promise<ModbusRtuLink>>();

	constructor(
		private readonly options: SerialOptions,
		private readonly logger: winston.Logger
	) {}

	open(port: string): Promise<RegisterReader> {
		let link = this.links.get(port);
		if (!link) {
			link = this.connect(port);
			this.links.set(port, link);
			// A failed open is not cached; the next caller retries
			void link.catch(() => this.links.delete(port));
		}
		return link;
	}

	private async connect(port: string): Promise<ModbusRtuLink> {
		const client = new ModbusRTU();
		try {
			await client.connectRTUBuffered(port, {
				baudRate: this.options.baudRate,
				dataBits: 8,
				stopBits: 1,
				parity: "none"
			});
		} catch (err) {
			throw deviceError(`Cannot open serial port ${port}: ${errorMessage(err)}`, { port }, err);
		}
		client.setTimeout(this.options.timeoutMs);

		this.logger.info("Modbus RTU port open: %s (baudRate=%d)", port, this.options.baudRate);
		return new ModbusRtuLink(port, client);
	}

	async closeAll(): Promise<void> {
		const pending = Array.from(this.links.values());
		this.links.clear();

		for (const p of pending) {
			try {
				const link = await p;
				await link.close();
			} catch (err) {
				this.logger.warn("Closing serial port failed: %s", errorMessage(err));
			}
		}
	}
}
