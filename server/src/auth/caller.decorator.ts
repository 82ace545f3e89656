import {
	createParamDecorator,
	type ExecutionContext,
	UnauthorizedException,
} from "@nestjs/common";
import type { AuthenticatedRequest } from "./authenticated-request";

/**
 * Identity of the authenticated caller. Requires `AuthGuard`.
 */
export const Caller = createParamDecorator(
	(_data: unknown, ctx: ExecutionContext): string => {
		const request = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
		if (!request.caller) {
			throw new UnauthorizedException();
		}
		return request.caller;
	},
);
