/**
 * Guider Operations
 *
 * Typed wrappers over the guiding application's remote methods. Each one is a
 * single call through {@link GuiderCaller}; results are validated before they
 * are handed back.
 * @module
 */

import * as rt from 'runtypes';

import type { SettleParams } from '../config.ts';
import { InvalidStateError } from '../errors.ts';
import type { GuiderCaller } from './client.ts';
import { AppStateRT, type AppState } from './protocol.ts';

export const ProfileRT = rt.Record({
	id: rt.Number,
	name: rt.String,
});

export type Profile = rt.Static<typeof ProfileRT>;

/**
 * Optional region of interest for star selection, in camera pixels.
 */
export interface Roi {
	x: number;
	y: number;
	width: number;
	height: number;
}

/** Wire form of settle parameters. */
function settleParams(settle: SettleParams): Record<string, number> {
	return { pixels: settle.pixels, time: settle.timeSeconds, timeout: settle.timeoutSeconds };
}

/**
 * Remote operations implemented purely in terms of `call`.
 */
export class GuiderOperations {
	constructor(private readonly caller: GuiderCaller) {}

	async getAppState(): Promise<AppState> {
		return this.expect('get_app_state', AppStateRT, await this.caller.call('get_app_state'));
	}

	/** Whether the equipment in the current profile is connected. */
	async getConnected(): Promise<boolean> {
		return this.expect('get_connected', rt.Boolean, await this.caller.call('get_connected'));
	}

	async setConnected(connected: boolean): Promise<void> {
		await this.caller.call('set_connected', [connected]);
	}

	async getProfiles(): Promise<Profile[]> {
		return this.expect('get_profiles', rt.Array(ProfileRT), await this.caller.call('get_profiles'));
	}

	/** Starts looping exposures. */
	async startLoop(): Promise<void> {
		await this.caller.call('loop');
	}

	/** Stops looping and guiding. */
	async stopCapture(): Promise<void> {
		await this.caller.call('stop_capture');
	}

	/**
	 * Starts guiding. Completion is reported later by a `SettleDone` event.
	 */
	async guide(settle: SettleParams, recalibrate = false, roi?: Roi): Promise<void> {
		await this.caller.call('guide', {
			settle: settleParams(settle),
			recalibrate,
			...(roi ? { roi: [roi.x, roi.y, roi.width, roi.height] } : {}),
		});
	}

	async dither(amount: number, raOnly: boolean, settle: SettleParams): Promise<void> {
		await this.caller.call('dither', { amount, raOnly, settle: settleParams(settle) });
	}

	/**
	 * Pauses guiding. A full pause also stops looping exposures.
	 */
	async pause(full = false): Promise<void> {
		await this.caller.call('set_paused', full ? { paused: true, type: 'full' } : { paused: true });
	}

	async resume(): Promise<void> {
		await this.caller.call('set_paused', { paused: false });
	}

	async isPaused(): Promise<boolean> {
		return this.expect('get_paused', rt.Boolean, await this.caller.call('get_paused'));
	}

	/** Asks the guiding application to exit. */
	async shutdown(): Promise<void> {
		await this.caller.call('shutdown');
	}

	/** @internal */
	private expect<T>(method: string, runtype: rt.Runtype<T>, value: unknown): T {
		const result = runtype.validate(value);
		if (!result.success) {
			throw new InvalidStateError(`unexpected result from ${method}: ${result.message}`, { method });
		}
		return result.value;
	}
}
