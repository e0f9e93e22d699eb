import { User } from '@/database/entities';
import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ReviewsModule } from '../reviews/reviews.module';
import { ValidationModule } from '../validation/validation.module';
import { PasswordResetController, UsersController } from './users.controller';
import { UsersService } from './users.service';

@Module({
  imports: [TypeOrmModule.forFeature([User]), ValidationModule, ReviewsModule],
  controllers: [UsersController, PasswordResetController],
  providers: [UsersService],
  exports: [UsersService],
})
export class UsersModule {}
