import { Global, Module } from '@nestjs/common'
import { BALANCE_CONFIG, loadBalanceConfig } from './balance.config'

@Global()
@Module({
  providers: [{ provide: BALANCE_CONFIG, useFactory: () => loadBalanceConfig() }],
  exports: [BALANCE_CONFIG],
})
export class ConfigModule {}
