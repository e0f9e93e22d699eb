import { CurrentUser } from '@/common/decorators/current-user.decorator';
import { Policy } from '@/common/decorators/policy.decorator';
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
  CreateTitleDto,
  ListTitlesQueryDto,
  UpdateTitleDto,
} from './dto/title.dto';
import { TitlesService } from './titles.service';
import { TitleResponse } from './types/title.type';

/**
 *  GET    /titles        ← public; search, filters, ordering, pagination
 *  GET    /titles/:id    ← public
 *  POST   /titles        ← staff
 *  PATCH  /titles/:id    ← staff
 *  DELETE /titles/:id    ← staff, cascades to reviews
 */
@Controller('titles')
export class TitlesController {
  constructor(private readonly titlesService: TitlesService) {}

  @Public()
  @Get()
  findAll(
    @Query() query: ListTitlesQueryDto,
  ): Promise<Paginated<TitleResponse>> {
    return this.titlesService.findAll(query);
  }

  @Public()
  @Get(':id')
  findOne(@Param('id', ParseIntPipe) id: number): Promise<TitleResponse> {
    return this.titlesService.findOne(id);
  }

  @Post()
  @Policy('title:create')
  @HttpCode(HttpStatus.CREATED)
  create(
    @CurrentUser() actor: AuthUser,
    @Body() dto: CreateTitleDto,
  ): Promise<TitleResponse> {
    return this.titlesService.create(actor, dto);
  }

  @Patch(':id')
  @Policy('title:update')
  update(
    @CurrentUser() actor: AuthUser,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateTitleDto,
  ): Promise<TitleResponse> {
    return this.titlesService.update(actor, id, dto);
  }

  @Delete(':id')
  @Policy('title:delete')
  @HttpCode(HttpStatus.NO_CONTENT)
  remove(
    @CurrentUser() actor: AuthUser,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<void> {
    return this.titlesService.remove(actor, id);
  }
}
