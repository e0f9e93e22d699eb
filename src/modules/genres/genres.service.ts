import {
  ConflictException,
  InvalidParameterException,
  ResourceNotFoundException,
} from '@/common/exceptions/domain.exception';
import { isUniqueViolation } from '@/common/exceptions/database-errors';
import { PaginationService } from '@/common/pagination/pagination.service';
import { Paginated } from '@/common/pagination/pagination.type';
import { AuthUser } from '@/common/types/jwt.type';
import { Genre } from '@/database/entities';
import { PolicyService } from '@/modules/policy/policy.service';
import { parseGenreIds } from '@/modules/titles/query/title-filters';
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { I18nService } from 'nestjs-i18n';
import { In, Repository } from 'typeorm';
import {
  CreateGenreDto,
  ListGenresQueryDto,
  UpdateGenreDto,
} from './dto/genre.dto';
import { GenreResponse, toGenreResponse } from './types/genre.type';

@Injectable()
export class GenresService {
  constructor(
    @InjectRepository(Genre) private readonly genres: Repository<Genre>,
    private readonly policy: PolicyService,
    private readonly pagination: PaginationService,
    private readonly i18n: I18nService,
  ) {}

  /**
   * @throws InvalidParameterException  `ids` is not a list of integers.
   */
  async findAll(
    query: ListGenresQueryDto,
  ): Promise<Paginated<GenreResponse>> {
    let ids: number[] | null = null;
    if (query.ids !== undefined && query.ids.trim() !== '') {
      const parsed = parseGenreIds(query.ids);
      if (!parsed.ok) {
        throw new InvalidParameterException(
          this.i18n.translate(parsed.error.key),
        );
      }
      ids = parsed.value;
    }

    const request = this.pagination.resolve(query);
    const window = this.pagination.window(request);

    const [genres, count] = await this.genres.findAndCount({
      where: ids === null ? {} : { id: In(ids) },
      order: { id: 'ASC' },
      skip: window?.skip,
      take: window?.take,
    });

    return this.pagination.build(request, count, genres.map(toGenreResponse));
  }

  async findOne(id: number): Promise<GenreResponse> {
    return toGenreResponse(await this.getOrFail(id));
  }

  /**
   * @throws ConflictException  Id or name already taken.
   */
  async create(actor: AuthUser, dto: CreateGenreDto): Promise<GenreResponse> {
    this.policy.assert(actor, 'genre:create');

    if (dto.id !== undefined && (await this.genres.existsBy({ id: dto.id }))) {
      throw new ConflictException(
        this.i18n.translate('catalog.errors.genreIdExists'),
      );
    }
    await this.assertNameAvailable(dto.name);

    const id = dto.id ?? (await this.nextId());
    try {
      const genre = await this.genres.save(
        this.genres.create({ id, name: dto.name }),
      );
      return toGenreResponse(genre);
    } catch (error) {
      if (isUniqueViolation(error)) throw this.nameTaken();
      throw error;
    }
  }

  async update(
    actor: AuthUser,
    id: number,
    dto: UpdateGenreDto,
  ): Promise<GenreResponse> {
    this.policy.assert(actor, 'genre:update');

    const genre = await this.getOrFail(id);
    if (genre.name !== dto.name) await this.assertNameAvailable(dto.name);

    try {
      await this.genres.update(id, { name: dto.name });
    } catch (error) {
      if (isUniqueViolation(error)) throw this.nameTaken();
      throw error;
    }
    return { id, name: dto.name };
  }

  /**
   * Links to titles go with the genre; the titles themselves stay.
   */
  async remove(actor: AuthUser, id: number): Promise<void> {
    this.policy.assert(actor, 'genre:delete');

    await this.getOrFail(id);
    await this.genres.delete(id);
  }

  private async nextId(): Promise<number> {
    const raw = await this.genres
      .createQueryBuilder('genre')
      .select('MAX(genre.id)', 'max')
      .getRawOne<{ max: number | string | null }>();
    return raw?.max === null || raw?.max === undefined
      ? 1
      : Number(raw.max) + 1;
  }

  private async assertNameAvailable(name: string): Promise<void> {
    if (await this.genres.existsBy({ name })) throw this.nameTaken();
  }

  private nameTaken(): ConflictException {
    return new ConflictException(
      this.i18n.translate('catalog.errors.genreExists'),
    );
  }

  private async getOrFail(id: number): Promise<Genre> {
    const genre = await this.genres.findOneBy({ id });
    if (!genre) {
      throw new ResourceNotFoundException(
        this.i18n.translate('catalog.errors.genreNotFound'),
      );
    }
    return genre;
  }
}
