import { Column, Entity, ManyToMany, PrimaryColumn } from 'typeorm';
import { Title } from './title.entity';

@Entity({ name: 'genres' })
export class Genre {
  /** Provider genre ids are kept as-is, so the key is assigned, not generated. */
  @PrimaryColumn({ type: 'int' })
  id!: number;

  @Column({ type: 'varchar', length: 100, unique: true })
  name!: string;

  @ManyToMany(() => Title, (title) => title.genres)
  titles!: Title[];
}
