import {
	type CanActivate,
	type ExecutionContext,
	Injectable,
	UnauthorizedException,
} from "@nestjs/common";
import { AuthService } from "./auth.service";
import type { AuthenticatedRequest } from "./authenticated-request";

@Injectable()
export class AuthGuard implements CanActivate {
	constructor(private readonly auth: AuthService) {}

	async canActivate(context: ExecutionContext): Promise<boolean> {
		const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
		const header = request.header("authorization");
		if (!header || !header.startsWith("Bearer ")) {
			throw new UnauthorizedException("Missing bearer token");
		}
		request.caller = await this.auth.authenticate(
			header.slice("Bearer ".length).trim(),
		);
		return true;
	}
}
