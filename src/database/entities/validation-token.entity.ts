import { Column, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

@Entity({ name: 'validation_tokens' })
@Index('idx_validation_token_email_token', ['email', 'token'])
export class ValidationToken {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 254 })
  email!: string;

  @Column({ type: 'varchar', length: 64 })
  token!: string;

  /** Set explicitly on insert so freshness is measured on the app clock. */
  @Column({ name: 'created_at', type: Date })
  createdAt!: Date;
}
