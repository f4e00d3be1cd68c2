import {
	createParamDecorator,
	type ExecutionContext,
	UnauthorizedException,
} from "@nestjs/common";
import type { Identity } from "@swap-escrow/sdk";
import type { AuthenticatedRequest } from "./authenticated-request";

/**
 * Caller identity set by {@link AuthGuard}.
 */
export const UserFromJwt = createParamDecorator(
	(_data: unknown, ctx: ExecutionContext): Identity => {
		const { identity } = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
		if (!identity) {
			throw new UnauthorizedException("Not authenticated");
		}
		return identity;
	},
);
