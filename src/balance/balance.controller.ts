import { Body, Controller, HttpCode, Inject, Post, UsePipes, ValidationPipe } from '@nestjs/common'
import { CLOCK, type Clock } from '../clock/clock'
import { BALANCE_CONFIG, type BalanceConfig } from '../config/balance.config'
import { evaluate } from './balance-evaluator'
import { presentFeedback } from './balance-presenter'
import { EvaluateBalanceDto } from './dto/evaluate-balance.dto'

@Controller('balance')
export class BalanceController {
  constructor(
    @Inject(BALANCE_CONFIG) private readonly config: BalanceConfig,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  @Post('evaluate')
  @HttpCode(200)
  @UsePipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true }))
  evaluateReading(@Body() dto: EvaluateBalanceDto) {
    const feedback = evaluate(dto.leftSide, dto.rightSide, this.config.thresholds)
    return presentFeedback(feedback, this.clock.now())
  }
}
