import {
	ExecutionContext,
	UnauthorizedException,
	createParamDecorator,
} from "@nestjs/common";
import type { AuthenticatedRequest } from "./auth.guard";

/** Account id set by AuthGuard. */
export const Caller = createParamDecorator(
	(_data: unknown, ctx: ExecutionContext): string => {
		const request = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
		if (!request.caller) {
			throw new UnauthorizedException();
		}
		return request.caller;
	},
);
