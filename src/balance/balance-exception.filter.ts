import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common'
import type { Response } from 'express'
import { BalanceError, type BalanceErrorCode } from './balance.errors'

const STATUS_BY_CODE: Record<BalanceErrorCode, number> = {
  INVALID_READING: HttpStatus.BAD_REQUEST,
  SENSOR_UNAVAILABLE: HttpStatus.SERVICE_UNAVAILABLE,
  CAPACITY_EXCEEDED: HttpStatus.CONFLICT,
  OUT_OF_ORDER_SAMPLE: HttpStatus.CONFLICT,
  INVALID_THRESHOLDS: HttpStatus.INTERNAL_SERVER_ERROR,
  SESSION_NOT_FOUND: HttpStatus.NOT_FOUND,
  EXERCISE_NOT_FOUND: HttpStatus.NOT_FOUND,
}

export type BalanceErrorBody = {
  statusCode: number
  code: BalanceErrorCode
  message: string
}

export function toErrorBody(err: BalanceError): BalanceErrorBody {
  return {
    statusCode: STATUS_BY_CODE[err.code],
    code: err.code,
    message: err.message,
  }
}

@Catch(BalanceError)
export class BalanceExceptionFilter implements ExceptionFilter<BalanceError> {
  private readonly logger = new Logger(BalanceExceptionFilter.name)

  catch(err: BalanceError, host: ArgumentsHost) {
    const body = toErrorBody(err)
    if (body.statusCode >= 500) {
      this.logger.warn(`${err.code}: ${err.message}`)
    }
    host.switchToHttp().getResponse<Response>().status(body.statusCode).json(body)
  }
}
