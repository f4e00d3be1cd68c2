import type { Request } from "express";
import type { Identity } from "@swap-escrow/sdk";

export interface AuthenticatedRequest extends Request {
	identity?: Identity;
}

export type JwtPayload = {
	sub: Identity;
};
