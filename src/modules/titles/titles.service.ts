import {
  ConflictException,
  InvalidParameterException,
  ResourceNotFoundException,
} from '@/common/exceptions/domain.exception';
import { isUniqueViolation } from '@/common/exceptions/database-errors';
import { PaginationService } from '@/common/pagination/pagination.service';
import { Paginated } from '@/common/pagination/pagination.type';
import { AuthUser } from '@/common/types/jwt.type';
import { Genre, Review, Title } from '@/database/entities';
import { PolicyService } from '@/modules/policy/policy.service';
import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { I18nService } from 'nestjs-i18n';
import { DataSource, EntityManager, In, Repository } from 'typeorm';
import {
  CreateTitleDto,
  ListTitlesQueryDto,
  UpdateTitleDto,
} from './dto/title.dto';
import { TitleQueryEngine } from './query/title-query.engine';
import { TitleResponse, toTitleResponse } from './types/title.type';

const MAX_ID_ALLOCATION_ATTEMPTS = 3;

@Injectable()
export class TitlesService {
  private readonly logger = new Logger(TitlesService.name);

  constructor(
    @InjectRepository(Title) private readonly titles: Repository<Title>,
    private readonly dataSource: DataSource,
    private readonly engine: TitleQueryEngine,
    private readonly policy: PolicyService,
    private readonly pagination: PaginationService,
    private readonly i18n: I18nService,
  ) {}

  async findAll(
    query: ListTitlesQueryDto,
  ): Promise<Paginated<TitleResponse>> {
    const page = this.pagination.resolve(query);
    const result = await this.engine.execute(query, page);
    return { ...result, results: result.results.map(toTitleResponse) };
  }

  async findOne(id: number): Promise<TitleResponse> {
    return toTitleResponse(await this.getOrFail(this.titles, id));
  }

  /**
   * Inserts a title under the given id, or under the lowest unused positive
   * integer when none is given. A generated id that loses a race against a
   * concurrent insert is re-allocated.
   *
   * @throws ConflictException          Explicit id already taken.
   * @throws InvalidParameterException  A genre id does not exist.
   */
  async create(actor: AuthUser, dto: CreateTitleDto): Promise<TitleResponse> {
    this.policy.assert(actor, 'title:create');

    for (let attempt = 1; ; attempt++) {
      try {
        const id = await this.dataSource.transaction((manager) =>
          this.insert(manager, dto),
        );
        this.logger.log(`Title ${id} created by user ${actor.id}`);
        return this.findOne(id);
      } catch (error) {
        if (!isUniqueViolation(error)) throw error;
        if (dto.id !== undefined || attempt >= MAX_ID_ALLOCATION_ATTEMPTS) {
          throw this.conflict();
        }
        this.logger.warn(
          `Title id allocation collided (attempt ${attempt}), retrying`,
        );
      }
    }
  }

  /**
   * `rating` is derived from reviews and is never written here.
   */
  async update(
    actor: AuthUser,
    id: number,
    dto: UpdateTitleDto,
  ): Promise<TitleResponse> {
    this.policy.assert(actor, 'title:update');

    await this.dataSource.transaction(async (manager) => {
      const repo = manager.getRepository(Title);
      const title = await this.getOrFail(repo, id);

      if (dto.title !== undefined) title.title = dto.title;
      if (dto.releaseDate !== undefined) title.releaseDate = dto.releaseDate;
      if (dto.overview !== undefined) title.overview = dto.overview;
      if (dto.imgUrl !== undefined) title.imgUrl = dto.imgUrl;
      if (dto.movieOrTv !== undefined) title.movieOrTv = dto.movieOrTv;
      if (dto.genres !== undefined) {
        title.genres = await this.loadGenres(manager, dto.genres);
      }

      await repo.save(title);
    });

    return this.findOne(id);
  }

  /**
   * Deletes the title together with its reviews and genre links.
   */
  async remove(actor: AuthUser, id: number): Promise<void> {
    this.policy.assert(actor, 'title:delete');

    await this.dataSource.transaction(async (manager) => {
      const repo = manager.getRepository(Title);
      const title = await this.getOrFail(repo, id);

      const { affected } = await manager
        .getRepository(Review)
        .delete({ titleId: id });
      if (title.genreIds.length > 0) {
        await manager
          .createQueryBuilder()
          .relation(Title, 'genres')
          .of(id)
          .remove(title.genreIds);
      }
      await repo.delete(id);

      this.logger.log(
        `Title ${id} deleted by user ${actor.id} with ${affected ?? 0} review(s)`,
      );
    });
  }

  private async insert(
    manager: EntityManager,
    dto: CreateTitleDto,
  ): Promise<number> {
    const repo = manager.getRepository(Title);

    if (dto.id !== undefined && (await repo.existsBy({ id: dto.id }))) {
      throw this.conflict();
    }

    const genres = await this.loadGenres(manager, dto.genres ?? []);
    const id = dto.id ?? (await this.lowestUnusedId(repo));

    await repo.save(
      repo.create({
        id,
        title: dto.title,
        releaseDate: dto.releaseDate,
        overview: dto.overview ?? '',
        imgUrl: dto.imgUrl ?? '',
        movieOrTv: dto.movieOrTv,
        rating: 0,
        genres,
      }),
    );
    return id;
  }

  /**
   * Smallest positive integer not used as a title id.
   */
  async lowestUnusedId(repo: Repository<Title> = this.titles): Promise<number> {
    if (!(await repo.existsBy({ id: 1 }))) return 1;

    const raw = await repo
      .createQueryBuilder('title')
      .select('MIN(title.id) + 1', 'next')
      .where(
        'NOT EXISTS (SELECT 1 FROM titles successor WHERE successor.id = title.id + 1)',
      )
      .getRawOne<{ next: number | string }>();

    return Number(raw?.next ?? 1);
  }

  private async loadGenres(
    manager: EntityManager,
    ids: number[],
  ): Promise<Genre[]> {
    const wanted = [...new Set(ids)];
    if (wanted.length === 0) return [];

    const genres = await manager
      .getRepository(Genre)
      .findBy({ id: In(wanted) });
    if (genres.length !== wanted.length) {
      const found = new Set(genres.map((genre) => genre.id));
      const missing = wanted.filter((id) => !found.has(id));
      throw new InvalidParameterException(
        this.i18n.translate('catalog.errors.genresNotFound', {
          args: { ids: missing.join(', ') },
        }),
      );
    }
    return genres;
  }

  private async getOrFail(repo: Repository<Title>, id: number): Promise<Title> {
    const title = await repo.findOneBy({ id });
    if (!title) {
      throw new ResourceNotFoundException(
        this.i18n.translate('catalog.errors.titleNotFound'),
      );
    }
    return title;
  }

  private conflict(): ConflictException {
    return new ConflictException(
      this.i18n.translate('catalog.errors.titleExists'),
    );
  }
}
