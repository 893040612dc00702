import { Module } from "@nestjs/common";
import { AccessModule } from "../access/access.module";
import { AuthModule } from "../auth/auth.module";
import { LendingModule } from "../lending/lending.module";
import { OracleModule } from "../oracle/oracle.module";
import { AdminController } from "./admin.controller";
import { AdminService } from "./admin.service";

@Module({
	imports: [AccessModule, AuthModule, LendingModule, OracleModule],
	providers: [AdminService],
	controllers: [AdminController],
})
export class AdminModule {}
