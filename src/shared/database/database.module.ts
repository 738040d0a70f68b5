import {
  Global,
  Inject,
  Logger,
  Module,
  OnModuleDestroy,
} from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { Pool } from 'pg';
import { PG_POOL } from './database.constants';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: PG_POOL,
      useFactory: (configService: ConfigService): Pool => {
        const logger = new Logger('DatabaseModule');
        const connectionString = configService.get<string>('DATABASE_URL');
        if (!connectionString) {
          throw new Error('DATABASE_URL is not defined in environment variables');
        }

        const pool = new Pool({
          connectionString,
          max: configService.get<number>('DATABASE_POOL_MAX') ?? 10,
        });
        pool.on('error', (error) =>
          logger.error(`Idle database client error: ${error.message}`),
        );
        logger.log('Database pool created');
        return pool;
      },
      inject: [ConfigService],
    },
  ],
  exports: [PG_POOL],
})
export class DatabaseModule implements OnModuleDestroy {
  constructor(@Inject(PG_POOL) private readonly pool: Pool) {}

  async onModuleDestroy(): Promise<void> {
    // Closes the connection pool when the app shuts down
    await this.pool.end();
  }
}
