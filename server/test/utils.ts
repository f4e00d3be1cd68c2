import request from "supertest";
import type { INestApplication } from "@nestjs/common";
import { JwtService } from "@nestjs/jwt";
import { Test, type TestingModule } from "@nestjs/testing";
import { AppModule } from "../src/app.module";
import { configureApp } from "../src/app.setup";

export const TEST_SECRET = "test-secret";
export const ESCROW = "swap-escrow";

const testEnv: Record<string, string> = {
	JWT_SECRET: TEST_SECRET,
	ESCROW_OWNER: "admin",
	ESCROW_TREASURY: "treasury",
	ESCROW_FEE_PERCENT: "5",
	ESCROW_CUSTODIAN: ESCROW,
	LEDGER_FAUCET_ENABLED: "true",
};

export async function createTestApp(
	overrides: Record<string, string> = {},
): Promise<INestApplication> {
	Object.assign(process.env, testEnv, overrides);
	const moduleFixture: TestingModule = await Test.createTestingModule({
		imports: [AppModule],
	}).compile();

	const app = configureApp(moduleFixture.createNestApplication());
	await app.init();
	return app;
}

const jwt = new JwtService({ secret: TEST_SECRET });

/** Bearer token for `identity`, as the identity provider would issue it */
export function tokenFor(identity: string): string {
	return jwt.sign({ sub: identity });
}

export async function fund(
	app: INestApplication,
	identity: string,
	asset: string,
	amount: string,
): Promise<void> {
	const token = tokenFor(identity);
	await request(app.getHttpServer())
		.post("/api/v1/ledger/mint")
		.set("Authorization", `Bearer ${token}`)
		.send({ asset, amount })
		.expect(200);
	await request(app.getHttpServer())
		.post("/api/v1/ledger/allowances")
		.set("Authorization", `Bearer ${token}`)
		.send({ asset, amount })
		.expect(200);
}

export async function balanceOf(
	app: INestApplication,
	identity: string,
	asset: string,
): Promise<string> {
	const res = await request(app.getHttpServer())
		.get(`/api/v1/ledger/balances/${asset}`)
		.set("Authorization", `Bearer ${tokenFor(identity)}`)
		.expect(200);
	return res.body.data.balance;
}

export const createSwapBody = {
	recipient: "bob",
	offerAsset: "GOLD",
	offerAmount: "1000",
	receiveAsset: "SILVER",
	receiveAmount: "2000",
};
