import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ProxyPoolFactory } from './services/proxy-pool.factory';

@Module({
  imports: [ConfigModule],
  providers: [ProxyPoolFactory],
  exports: [ProxyPoolFactory],
})
export class ProxyModule {}
