import { Module } from "@nestjs/common";
import { ACCESS_GATE } from "./access-gate";
import { ConfigAccessGate } from "./config-access-gate";

@Module({
	providers: [{ provide: ACCESS_GATE, useClass: ConfigAccessGate }],
	exports: [ACCESS_GATE],
})
export class AccessModule {}
