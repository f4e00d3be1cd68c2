import type { ConfigService } from "@nestjs/config";
import { DEFAULT_FEE_PERCENT, type InitializeParams } from "@swap-escrow/sdk";

export const DEFAULT_CUSTODIAN = "swap-escrow";

export type EngineSettings = {
	custodian: string;
	bootstrap: InitializeParams;
};

/**
 * Reads the custodian identity and bootstrap parameters from the
 * environment. Range checks on the fee are left to the engine.
 */
export function readEngineSettings(config: ConfigService): EngineSettings {
	const owner = config.getOrThrow<string>("ESCROW_OWNER");
	const rawFee = config.get<string>("ESCROW_FEE_PERCENT");
	return {
		custodian: config.get<string>("ESCROW_CUSTODIAN") ?? DEFAULT_CUSTODIAN,
		bootstrap: {
			owner,
			treasury: config.get<string>("ESCROW_TREASURY") ?? owner,
			feePercent:
				rawFee === undefined || rawFee.trim() === ""
					? DEFAULT_FEE_PERCENT
					: Number(rawFee),
		},
	};
}
