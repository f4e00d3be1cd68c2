import {
	type ArgumentsHost,
	Catch,
	type ExceptionFilter,
	HttpStatus,
	Logger,
} from "@nestjs/common";
import type { Response } from "express";
import {
	SwapError,
	type SwapErrorCode,
	TransferError,
	type TransferErrorCode,
} from "@swap-escrow/sdk";

const SWAP_ERROR_STATUS: Record<SwapErrorCode, HttpStatus> = {
	INVALID_ARGUMENT: HttpStatus.BAD_REQUEST,
	INBOUND_REJECTED: HttpStatus.BAD_REQUEST,
	UNAUTHORIZED: HttpStatus.FORBIDDEN,
	NOT_FOUND: HttpStatus.NOT_FOUND,
	INVALID_STATE: HttpStatus.CONFLICT,
	REENTRANT: HttpStatus.CONFLICT,
	ALREADY_INITIALIZED: HttpStatus.CONFLICT,
	TRANSFER_FAILURE: HttpStatus.UNPROCESSABLE_ENTITY,
	NOT_INITIALIZED: HttpStatus.SERVICE_UNAVAILABLE,
};

const TRANSFER_ERROR_STATUS: Record<TransferErrorCode, HttpStatus> = {
	INVALID_AMOUNT: HttpStatus.BAD_REQUEST,
	INVALID_ACCOUNT: HttpStatus.BAD_REQUEST,
	INSUFFICIENT_BALANCE: HttpStatus.UNPROCESSABLE_ENTITY,
	INSUFFICIENT_ALLOWANCE: HttpStatus.UNPROCESSABLE_ENTITY,
};

export type SwapErrorBody = {
	statusCode: HttpStatus;
	error: SwapErrorCode | TransferErrorCode;
	message: string;
};

export function toErrorBody(exception: SwapError | TransferError): SwapErrorBody {
	const statusCode =
		exception instanceof SwapError
			? SWAP_ERROR_STATUS[exception.code]
			: TRANSFER_ERROR_STATUS[exception.code];
	return { statusCode, error: exception.code, message: exception.message };
}

/**
 * Turns engine and ledger failures into HTTP responses carrying the
 * failure code.
 */
@Catch(SwapError, TransferError)
export class SwapErrorFilter implements ExceptionFilter {
	private readonly logger = new Logger(SwapErrorFilter.name);

	catch(exception: SwapError | TransferError, host: ArgumentsHost): void {
		const response = host.switchToHttp().getResponse<Response>();
		const body = toErrorBody(exception);

		if (body.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
			this.logger.error(exception.message, exception.stack);
		} else {
			this.logger.debug(`${body.error}: ${exception.message}`);
		}

		response.status(body.statusCode).json(body);
	}
}
