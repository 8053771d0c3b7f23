import { Global, Module } from '@nestjs/common';

import { StoreInitializer } from './store-initializer.service';
import { TransactionRunner } from './transaction-runner.service';

@Global()
@Module({
  providers: [TransactionRunner, StoreInitializer],
  exports: [TransactionRunner, StoreInitializer],
})
export class DatabaseModule {}
