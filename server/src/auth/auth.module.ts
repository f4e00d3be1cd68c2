import { Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { JwtModule } from "@nestjs/jwt";
import { AuthGuard } from "./auth.guard";

@Module({
	imports: [
		JwtModule.registerAsync({
			inject: [ConfigService],
			useFactory: (config: ConfigService) => ({
				secret: config.getOrThrow<string>("JWT_SECRET"),
				verifyOptions: { algorithms: ["HS256"] },
			}),
		}),
	],
	providers: [AuthGuard],
	exports: [AuthGuard, JwtModule],
})
export class AuthModule {}
