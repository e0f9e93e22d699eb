import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { APP_GUARD } from '@nestjs/core';
import {
  AcceptLanguageResolver,
  HeaderResolver,
  I18nModule,
  QueryResolver,
} from 'nestjs-i18n';
import * as path from 'path';
import { AppCacheModule } from './cache/cache.module';
import { PaginationModule } from './common/pagination/pagination.module';
import configuration from './config/configuration';
import { DatabaseModule } from './database/database.module';
import { AuthModule } from './modules/auth/auth.module';
import { JwtAuthGuard } from './modules/auth/guards/jwt-auth.guard';
import { PolicyGuard } from './modules/auth/guards/policy.guard';
import { GenresModule } from './modules/genres/genres.module';
import { MailModule } from './modules/mail/mail.module';
import { MetadataModule } from './modules/metadata/metadata.module';
import { PolicyModule } from './modules/policy/policy.module';
import { ReviewsModule } from './modules/reviews/reviews.module';
import { TitlesModule } from './modules/titles/titles.module';
import { UsersModule } from './modules/users/users.module';
import { ValidationModule } from './modules/validation/validation.module';

@Module({
  imports: [
    // Global Config Module
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      envFilePath: '.env',
    }),

    // I18nModule with async configuration
    I18nModule.forRootAsync({
      useFactory: (config: ConfigService) => ({
        fallbackLanguage: config.get<string>('i18n.defaultLanguage', 'en'),
        loaderOptions: {
          path: path.join(__dirname, '/i18n/'),
          watch: config.get<string>('app.env') === 'development',
        },
      }),
      resolvers: [
        { use: QueryResolver, options: ['lang'] },
        AcceptLanguageResolver,
        new HeaderResolver(['x-lang']),
      ],
      inject: [ConfigService],
    }),

    DatabaseModule,
    AppCacheModule,
    PaginationModule,
    PolicyModule,

    AuthModule,
    UsersModule,
    ValidationModule,
    MailModule,
    TitlesModule,
    ReviewsModule,
    GenresModule,
    MetadataModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: JwtAuthGuard,
    },
    {
      provide: APP_GUARD,
      useClass: PolicyGuard,
    },
  ],
})
export class AppModule {}
