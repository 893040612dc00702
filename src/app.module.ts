import { ConfigModule } from "@nestjs/config";
import {
	MiddlewareConsumer,
	Module,
	NestModule,
	RequestMethod,
} from "@nestjs/common";
import { EventEmitterModule } from "@nestjs/event-emitter";
import { TypeOrmModule } from "@nestjs/typeorm";

import { AdminModule } from "./admin/admin.module";
import { CoreModule } from "./common/core.module";
import { RequestLoggingMiddleware } from "./common/middlewares/request-logging.middleware";
import { HealthModule } from "./health.module";
import { LendingModule } from "./lending/lending.module";

@Module({
	imports: [
		ConfigModule.forRoot({ isGlobal: true }),
		EventEmitterModule.forRoot(),
		TypeOrmModule.forRootAsync({
			useFactory: () => ({
				type: "better-sqlite3",
				database:
					process.env.NODE_ENV === "test"
						? ":memory:"
						: (process.env.SQLITE_DB_PATH ?? "lending.sqlite"),
				autoLoadEntities: true,
				synchronize: true,
				logging: process.env.TYPEORM_LOGGING === "true",
			}),
		}),
		CoreModule,
		LendingModule,
		AdminModule,
		HealthModule,
	],
})
export class AppModule implements NestModule {
	configure(consumer: MiddlewareConsumer) {
		consumer
			.apply(RequestLoggingMiddleware)
			.forRoutes({ path: "*", method: RequestMethod.ALL });
	}
}
