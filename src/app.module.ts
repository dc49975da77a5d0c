import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuthModule } from './auth/auth.module';
import { CategoriesModule } from './categories/categories.module';
import { ComplaintsModule } from './complaints/complaints.module';
import { ALL_CONFIGS, databaseConfig, DatabaseConfig } from './config/configuration';
import { validateEnv } from './config/env.validation';
import { DatabaseModule } from './database/database.module';
import { ENTITIES } from './database/entities';
import { FeedbackModule } from './feedback/feedback.module';
import { NotificationModule } from './notification/notification.module';
import { SeederModule } from './seeder/seeder.module';
import { UsersModule } from './users/users.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: ALL_CONFIGS,
      validate: validateEnv,
    }),
    TypeOrmModule.forRootAsync({
      inject: [databaseConfig.KEY],
      useFactory: (db: DatabaseConfig) => ({
        type: 'postgres',
        host: db.host,
        port: db.port,
        username: db.username,
        password: db.password,
        database: db.name,
        entities: ENTITIES,
        synchronize: db.synchronize,
        logging: db.logging,
      }),
    }),
    DatabaseModule,
    AuthModule,
    UsersModule,
    CategoriesModule,
    ComplaintsModule,
    FeedbackModule,
    NotificationModule,
    SeederModule,
  ],
})
export class AppModule {}
