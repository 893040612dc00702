import { Global, Logger, Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { LENDING_CONFIG, loadLendingConfig } from "../config/lending.config";
import { CLOCK, SystemClock } from "./clock";
import { RecordLockService } from "./record-lock.service";

@Global()
@Module({
	providers: [
		{ provide: CLOCK, useClass: SystemClock },
		{
			provide: LENDING_CONFIG,
			inject: [ConfigService],
			useFactory: (cfg: ConfigService) => {
				const config = loadLendingConfig(cfg);
				Logger.log(
					`Lending config: maxUtilization=${config.maxUtilizationBps}bps maxPriceAge=${config.maxPriceAgeSeconds}s minConfidence=${config.minPriceConfidenceBps}bps`,
				);
				return config;
			},
		},
		RecordLockService,
	],
	exports: [CLOCK, LENDING_CONFIG, RecordLockService],
})
export class CoreModule {}
