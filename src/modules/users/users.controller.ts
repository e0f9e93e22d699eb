import { CurrentUser } from '@/common/decorators/current-user.decorator';
import { Public } from '@/common/decorators/public.decorator';
import { Paginated } from '@/common/pagination/pagination.type';
import { AuthUser } from '@/common/types/jwt.type';
import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  Query,
} from '@nestjs/common';
import {
  ListUsersQueryDto,
  RegisterDto,
  ResetPasswordDto,
  UpdateUserDto,
} from './dto/user.dto';
import { UserResponse } from './types/user.type';
import { UsersService } from './users.service';

/**
 *  POST   /users        ← register with a validation token (public)
 *  GET    /users        ← staff only
 *  GET    /users/:id    ← self or staff
 *  PATCH  /users/:id    ← self or staff
 *  DELETE /users/:id    ← self or staff
 */
@Controller('users')
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  @Public()
  @Post()
  @HttpCode(HttpStatus.CREATED)
  register(@Body() dto: RegisterDto): Promise<UserResponse> {
    return this.usersService.register(dto);
  }

  @Get()
  findAll(
    @CurrentUser() actor: AuthUser,
    @Query() query: ListUsersQueryDto,
  ): Promise<Paginated<UserResponse>> {
    return this.usersService.findAll(actor, query);
  }

  @Get(':id')
  findOne(
    @CurrentUser() actor: AuthUser,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<UserResponse> {
    return this.usersService.findOne(actor, id);
  }

  @Patch(':id')
  update(
    @CurrentUser() actor: AuthUser,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateUserDto,
  ): Promise<UserResponse> {
    return this.usersService.update(actor, id, dto);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  remove(
    @CurrentUser() actor: AuthUser,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<void> {
    return this.usersService.remove(actor, id);
  }
}

/**
 *  POST /password-reset   ← { email, token, newPassword }
 */
@Controller('password-reset')
export class PasswordResetController {
  constructor(private readonly usersService: UsersService) {}

  @Public()
  @Post()
  @HttpCode(HttpStatus.OK)
  reset(@Body() dto: ResetPasswordDto): Promise<{ message: string }> {
    return this.usersService.resetPassword(dto);
  }
}
