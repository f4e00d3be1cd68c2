import { type INestApplication, ValidationPipe } from "@nestjs/common";
import { SwapErrorFilter } from "./common/filters/swap-error.filter";

/**
 * Global pipes and filters, shared by `main.ts` and the e2e tests.
 */
export function configureApp(app: INestApplication): INestApplication {
	// biome-ignore lint/correctness/useHookAtTopLevel: backend
	app.useGlobalPipes(
		new ValidationPipe({
			whitelist: true,
			forbidNonWhitelisted: true,
			transform: true,
		}),
	);
	// biome-ignore lint/correctness/useHookAtTopLevel: backend
	app.useGlobalFilters(new SwapErrorFilter());
	app.enableCors();
	return app;
}
