import {
	CanActivate,
	ExecutionContext,
	Injectable,
	UnauthorizedException,
} from "@nestjs/common";
import { JwtService } from "@nestjs/jwt";
import type { Request } from "express";

export type AccessTokenPayload = {
	/** Account id of the caller. */
	sub: string;
};

export type AuthenticatedRequest = Request & { caller?: string };

@Injectable()
export class AuthGuard implements CanActivate {
	constructor(private readonly jwt: JwtService) {}

	async canActivate(context: ExecutionContext): Promise<boolean> {
		const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
		const token = bearerToken(request);
		if (!token) {
			throw new UnauthorizedException("Missing bearer token");
		}
		let payload: AccessTokenPayload;
		try {
			payload = await this.jwt.verifyAsync<AccessTokenPayload>(token);
		} catch (e) {
			throw new UnauthorizedException("Invalid or expired token", {
				cause: e,
			});
		}
		if (typeof payload.sub !== "string" || payload.sub.length === 0) {
			throw new UnauthorizedException("Token has no subject");
		}
		request.caller = payload.sub;
		return true;
	}
}

function bearerToken(request: Request): string | undefined {
	const header = request.header("authorization");
	if (!header?.startsWith("Bearer ")) {
		return undefined;
	}
	return header.slice("Bearer ".length).trim() || undefined;
}
