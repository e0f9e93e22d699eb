import { User } from '@/database/entities';
import { UsersModule } from '@/modules/users/users.module';
import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtModule } from '@nestjs/jwt';
import { PassportModule } from '@nestjs/passport';
import { TypeOrmModule } from '@nestjs/typeorm';
import { StringValue } from 'ms';
import { AccountLockoutService } from './account-lockout.service';
import { AuthController } from './auth.controller';
import { AuthService } from './auth.service';
import { GoogleIdentityService } from './google-identity.service';
import { JwtStrategy } from './strategies/jwt.strategy';

@Module({
  imports: [
    JwtModule.registerAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        global: true,
        secret: config.get<string>('jwt.secret', ''),
        signOptions: {
          expiresIn: config.get<StringValue>('jwt.expiresIn', '15m'),
        },
      }),
    }),
    PassportModule,
    TypeOrmModule.forFeature([User]),
    UsersModule,
  ],
  controllers: [AuthController],
  providers: [
    AuthService,
    AccountLockoutService,
    GoogleIdentityService,
    JwtStrategy,
  ],
  exports: [AuthService],
})
export class AuthModule {}
