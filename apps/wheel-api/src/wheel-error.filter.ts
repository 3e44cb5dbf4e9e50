import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus } from "@nestjs/common";
import type { Response } from "express";
import { WheelError, httpStatusFor } from "@prize-wheel/core-errors";
import { LockUnavailableError } from "@prize-wheel/core-redis";

/** Renders engine errors as `{ error, reason, message, details }` with the mapped status. */
@Catch(WheelError, LockUnavailableError)
export class WheelErrorFilter implements ExceptionFilter<WheelError | LockUnavailableError> {
  catch(exception: WheelError | LockUnavailableError, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    if (exception instanceof LockUnavailableError) {
      response.status(HttpStatus.CONFLICT).json({
        error: "BUSY",
        message: "another operation on this wheel is in progress",
      });
      return;
    }
    response.status(httpStatusFor(exception.code)).json(exception.toPayload());
  }
}
