import type { Request } from "express";

export type AuthenticatedRequest = Request & {
	/** Identity from the verified token's `sub` claim */
	caller?: string;
};

export type JwtPayload = {
	sub: string;
};
