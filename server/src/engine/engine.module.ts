import { Global, Logger, Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { EventEmitter2 } from "@nestjs/event-emitter";
import {
	MemoryAssetLedger,
	REQUEST_CREATED,
	STATUS_CHANGED,
	SerialExecutor,
	type SwapEvent,
	SwapEngine,
} from "@swap-escrow/sdk";
import { readEngineSettings } from "./engine.config";
import { toError } from "../common/errors";
import { ServerSentEventsService } from "../common/server-sent-events.service";

function describeEvent(event: SwapEvent): string {
	switch (event.type) {
		case REQUEST_CREATED:
		case STATUS_CHANGED:
			return `${event.type} #${event.id}`;
		default:
			return event.type;
	}
}

/**
 * One engine, one ledger and one executor for the whole process. Every
 * mutating call goes through the executor.
 */
@Global()
@Module({
	providers: [
		{ provide: MemoryAssetLedger, useValue: new MemoryAssetLedger() },
		{ provide: SerialExecutor, useValue: new SerialExecutor() },
		{
			provide: SwapEngine,
			inject: [ConfigService, EventEmitter2, MemoryAssetLedger],
			useFactory: (
				config: ConfigService,
				events: EventEmitter2,
				ledger: MemoryAssetLedger,
			) => {
				const logger = new Logger(SwapEngine.name);
				const { custodian, bootstrap } = readEngineSettings(config);

				const engine = new SwapEngine({
					transfers: ledger.forCustodian(custodian),
					custodian,
					onEvent: async (event) => {
						logger.debug(describeEvent(event));
						await events.emitAsync(event.type, event);
					},
					onEventError: (error, event) => {
						const err = toError(error);
						logger.error(
							`Failed to deliver ${describeEvent(event)}: ${err.message}`,
							err.stack,
						);
					},
				});
				const initial = engine.initialize(bootstrap);
				ledger.setReceiver(custodian, engine);

				logger.log(
					`Escrow ${custodian} ready: owner=${initial.owner} treasury=${initial.treasury} fee=${initial.feePercent}%`,
				);
				return engine;
			},
		},
		ServerSentEventsService,
	],
	exports: [
		MemoryAssetLedger,
		SerialExecutor,
		SwapEngine,
		ServerSentEventsService,
	],
})
export class EngineModule {}
