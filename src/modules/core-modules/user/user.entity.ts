import { Column, Entity, Index, PrimaryGeneratedColumn, Unique } from 'typeorm';
import { bigintTransformer } from '../../../common/database/bigint.transformer';

@Entity('users')
@Unique('UQ_users_telegram_id', ['telegram_id'])
export class UserEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({
    name: 'telegram_id',
    type: 'bigint',
    transformer: bigintTransformer,
  })
  telegram_id!: number;

  /** Username без @, может поменяться в Telegram в любой момент */
  @Column({ name: 'telegram_username', type: 'varchar', nullable: true })
  telegram_username!: string | null;

  /** first_name на момент последней записи */
  @Column({ name: 'telegram_name', type: 'varchar' })
  telegram_name!: string;

  @Column({ name: 'game_nick', type: 'varchar', length: 32 })
  game_nick!: string;

  /**
   * Выставляем вручную, а не через CreateDateColumn:
   * при вставке created_at и updated_at должны совпадать.
   */
  @Index('IDX_users_created_at')
  @Column({ name: 'created_at', type: 'timestamptz' })
  created_at!: Date;

  @Column({ name: 'updated_at', type: 'timestamptz' })
  updated_at!: Date;
}
