import { Injectable, Logger, UnauthorizedException } from "@nestjs/common";
import { JwtService } from "@nestjs/jwt";
import { toError } from "../common/errors";
import type { JwtPayload } from "./authenticated-request";

@Injectable()
export class AuthService {
	private readonly logger = new Logger(AuthService.name);

	constructor(private readonly jwt: JwtService) {}

	/**
	 * Verify a bearer token and return the caller identity it carries.
	 */
	async authenticate(token: string): Promise<string> {
		let payload: Partial<JwtPayload>;
		try {
			payload = await this.jwt.verifyAsync<Partial<JwtPayload>>(token);
		} catch (e) {
			this.logger.debug(`Invalid token: ${toError(e).message}`);
			throw new UnauthorizedException("Invalid token");
		}
		if (typeof payload.sub !== "string" || payload.sub.trim().length === 0) {
			throw new UnauthorizedException("Token has no subject");
		}
		return payload.sub;
	}

	/**
	 * Issue a token for an identity. Used by tooling and tests; identities are
	 * established outside this service.
	 */
	issue(identity: string): Promise<string> {
		return this.jwt.signAsync({ sub: identity });
	}
}
