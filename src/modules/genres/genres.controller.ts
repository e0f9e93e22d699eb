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
  CreateGenreDto,
  ListGenresQueryDto,
  UpdateGenreDto,
} from './dto/genre.dto';
import { GenreSyncService } from './genre-sync.service';
import { GenresService } from './genres.service';
import { GenreResponse, GenreSyncResult } from './types/genre.type';

/**
 *  GET    /genres?ids=28,12   ← public, paginated
 *  GET    /genres/:id         ← public
 *  POST   /genres             ← staff
 *  POST   /genres/sync        ← staff, pulls the provider's genre list
 *  PATCH  /genres/:id         ← staff
 *  DELETE /genres/:id         ← staff
 */
@Controller('genres')
export class GenresController {
  constructor(
    private readonly genresService: GenresService,
    private readonly genreSyncService: GenreSyncService,
  ) {}

  @Public()
  @Get()
  findAll(
    @Query() query: ListGenresQueryDto,
  ): Promise<Paginated<GenreResponse>> {
    return this.genresService.findAll(query);
  }

  @Public()
  @Get(':id')
  findOne(@Param('id', ParseIntPipe) id: number): Promise<GenreResponse> {
    return this.genresService.findOne(id);
  }

  @Post()
  @Policy('genre:create')
  @HttpCode(HttpStatus.CREATED)
  create(
    @CurrentUser() actor: AuthUser,
    @Body() dto: CreateGenreDto,
  ): Promise<GenreResponse> {
    return this.genresService.create(actor, dto);
  }

  @Post('sync')
  @Policy('genre:sync')
  @HttpCode(HttpStatus.OK)
  sync(): Promise<GenreSyncResult> {
    return this.genreSyncService.sync();
  }

  @Patch(':id')
  @Policy('genre:update')
  update(
    @CurrentUser() actor: AuthUser,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateGenreDto,
  ): Promise<GenreResponse> {
    return this.genresService.update(actor, id, dto);
  }

  @Delete(':id')
  @Policy('genre:delete')
  @HttpCode(HttpStatus.NO_CONTENT)
  remove(
    @CurrentUser() actor: AuthUser,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<void> {
    return this.genresService.remove(actor, id);
  }
}
