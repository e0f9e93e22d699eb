import {
  Column,
  CreateDateColumn,
  Entity,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  Unique,
} from 'typeorm';
import { Title } from './title.entity';
import { User } from './user.entity';

@Entity({ name: 'reviews' })
@Unique('uq_review_author_title', ['authorId', 'titleId'])
export class Review {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'author_id', type: 'int' })
  authorId!: number;

  @ManyToOne(() => User, (user) => user.reviews, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'author_id' })
  author!: User;

  @Column({ name: 'title_id', type: 'int' })
  titleId!: number;

  @ManyToOne(() => Title, (title) => title.reviews, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'title_id' })
  title!: Title;

  @Column({ type: 'float' })
  rating!: number;

  @Column({ type: 'varchar', length: 200, default: '' })
  comment!: string;

  @CreateDateColumn({ name: 'date_posted' })
  datePosted!: Date;
}
