import { User, ValidationToken } from '@/database/entities';
import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { MailModule } from '../mail/mail.module';
import { ValidationTokenService } from './validation-token.service';
import { ValidationController } from './validation.controller';
import { ValidationService } from './validation.service';

@Module({
  imports: [TypeOrmModule.forFeature([ValidationToken, User]), MailModule],
  controllers: [ValidationController],
  providers: [ValidationTokenService, ValidationService],
  exports: [ValidationTokenService, ValidationService],
})
export class ValidationModule {}
