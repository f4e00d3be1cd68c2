import {
	type CanActivate,
	type ExecutionContext,
	Injectable,
	Logger,
	UnauthorizedException,
} from "@nestjs/common";
import { JwtService } from "@nestjs/jwt";
import { isNullIdentity } from "@swap-escrow/sdk";
import type { AuthenticatedRequest, JwtPayload } from "./authenticated-request";
import { toError } from "../common/errors";

/**
 * Accepts `Authorization: Bearer <jwt>` and exposes the token's `sub` as the
 * caller identity.
 */
@Injectable()
export class AuthGuard implements CanActivate {
	private readonly logger = new Logger(AuthGuard.name);

	constructor(private readonly jwt: JwtService) {}

	async canActivate(context: ExecutionContext): Promise<boolean> {
		const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
		const token = extractBearerToken(request.headers.authorization);
		if (!token) {
			throw new UnauthorizedException("Missing bearer token");
		}

		let payload: JwtPayload;
		try {
			payload = await this.jwt.verifyAsync<JwtPayload>(token);
		} catch (e) {
			this.logger.debug(`Rejected token: ${toError(e).message}`);
			throw new UnauthorizedException("Invalid or expired token");
		}
		if (typeof payload.sub !== "string" || isNullIdentity(payload.sub)) {
			throw new UnauthorizedException("Token has no subject");
		}

		request.identity = payload.sub;
		return true;
	}
}

function extractBearerToken(header: string | undefined): string | undefined {
	if (!header?.startsWith("Bearer ")) return undefined;
	return header.slice("Bearer ".length).trim() || undefined;
}
