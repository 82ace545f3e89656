import {
	type ArgumentsHost,
	Catch,
	type ExceptionFilter,
	HttpException,
	HttpStatus,
	Logger,
} from "@nestjs/common";
import { type EscrowErrorCode, isEscrowError } from "@custody-escrow/sdk";
import type { Response } from "express";
import { toError } from "../errors";

const STATUS_BY_CODE: Record<EscrowErrorCode, HttpStatus> = {
	UNAUTHORIZED: HttpStatus.FORBIDDEN,
	ESCROW_NOT_FOUND: HttpStatus.NOT_FOUND,
	INVALID_STATE: HttpStatus.CONFLICT,
	ESCROW_ALREADY_EXISTS: HttpStatus.CONFLICT,
	DEADLINE_PASSED: HttpStatus.UNPROCESSABLE_ENTITY,
	DEADLINE_NOT_REACHED: HttpStatus.UNPROCESSABLE_ENTITY,
	TRANSFER_FAILURE: HttpStatus.UNPROCESSABLE_ENTITY,
	INVALID_AMOUNT: HttpStatus.BAD_REQUEST,
	INVALID_DEADLINE: HttpStatus.BAD_REQUEST,
	INVALID_PARTIES: HttpStatus.BAD_REQUEST,
};

export function statusForEscrowError(code: EscrowErrorCode): HttpStatus {
	return STATUS_BY_CODE[code];
}

/**
 * Renders escrow domain errors as `{ statusCode, code, message }`, passes Nest
 * HTTP exceptions through and turns anything else into a logged 500.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
	private readonly logger = new Logger(HttpExceptionFilter.name);

	catch(exception: unknown, host: ArgumentsHost) {
		const res = host.switchToHttp().getResponse<Response>();

		if (isEscrowError(exception)) {
			const statusCode = statusForEscrowError(exception.code);
			res.status(statusCode).json({
				statusCode,
				code: exception.code,
				message: exception.message,
			});
			return;
		}

		if (exception instanceof HttpException) {
			const statusCode = exception.getStatus();
			const body = exception.getResponse();
			res
				.status(statusCode)
				.json(
					typeof body === "string" ? { statusCode, message: body } : body,
				);
			return;
		}

		const error = toError(exception);
		this.logger.error(error.message, error.stack);
		res.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
			statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
			message: "Internal server error",
		});
	}
}
