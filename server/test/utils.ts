import type { INestApplication } from "@nestjs/common";
import request from "supertest";
import { AuthService } from "../src/auth/auth.service";

export const ADMIN_USER = "admin";
export const ADMIN_PASS = "test-secret";

/** Placeholder configuration the e2e suites boot the app with */
export function setTestEnv(): void {
	process.env.JWT_SECRET = "test-secret";
	process.env.ADMIN_BASIC_USER = ADMIN_USER;
	process.env.ADMIN_BASIC_PASS = ADMIN_PASS;
}

export function tokenFor(app: INestApplication, identity: string): Promise<string> {
	return app.get(AuthService).issue(identity);
}

export async function fund(
	app: INestApplication,
	handle: string,
	amount: number,
): Promise<void> {
	await request(app.getHttpServer())
		.post("/api/v1/admin/ledger/deposits")
		.auth(ADMIN_USER, ADMIN_PASS)
		.send({ handle, amount })
		.expect(201);
}

export async function balanceOf(
	app: INestApplication,
	token: string,
): Promise<number> {
	const res = await request(app.getHttpServer())
		.get("/api/v1/ledger/balance")
		.set("Authorization", `Bearer ${token}`)
		.expect(200);
	return res.body.data.balance;
}
