import { Logger, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';
import { DatabaseDriver } from '@/config/database.config';

const logger = new Logger('DatabaseModule');

/**
 * Builds the TypeORM connection options from the `database` config namespace.
 *
 * Entities register themselves through `TypeOrmModule.forFeature` in their
 * feature module (`autoLoadEntities`).
 */
export function buildTypeOrmOptions(configService: ConfigService): TypeOrmModuleOptions {
  const driver = configService.get<DatabaseDriver>('database.driver', 'postgres');
  const url = configService.get<string>('database.url', '');
  const synchronize = configService.get<boolean>('database.synchronize', false);
  const logging = configService.get<boolean>('database.logging', false);

  logger.log(`Using ${driver} database (synchronize=${synchronize})`);

  if (driver === 'better-sqlite3') {
    return {
      type: 'better-sqlite3',
      database: url,
      autoLoadEntities: true,
      synchronize,
      logging,
    };
  }

  return {
    type: 'postgres',
    url,
    autoLoadEntities: true,
    synchronize,
    logging,
  };
}

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: buildTypeOrmOptions,
      inject: [ConfigService],
    }),
  ],
})
export class DatabaseModule {}
