import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ProxyModule } from '@/shared/proxy/proxy.module';
import { PROFILE_FETCHER } from './checker/profile-fetcher.interface';
import { UndiciProfileFetcher } from './checker/undici-profile.fetcher';
import { PgTaskRepository } from './repositories/pg-task.repository';
import { TaskRepository } from './repositories/task.repository';
import { BanCheckOrchestratorService } from './services/ban-check-orchestrator.service';
import { TaskStoreService } from './services/task-store.service';

@Module({
  imports: [ConfigModule, ProxyModule],
  providers: [
    { provide: TaskRepository, useClass: PgTaskRepository },
    { provide: PROFILE_FETCHER, useClass: UndiciProfileFetcher },
    TaskStoreService,
    BanCheckOrchestratorService,
  ],
  exports: [TaskStoreService, BanCheckOrchestratorService, ProxyModule],
})
export class BanCheckModule {}
