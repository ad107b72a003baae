import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from "typeorm";

import { YamdbUser } from "./YamdbUser";

/**
 * One-time code emailed on registration.
 *
 * Only the latest code of a user is accepted, once, until it expires.
 */
@Entity("yamdb_confirmation_codes")
export class YamdbConfirmationCode {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index()
  @Column({ type: "int" })
  user_id!: number;

  @ManyToOne(() => YamdbUser, { onDelete: "CASCADE" })
  @JoinColumn({ name: "user_id" })
  user!: YamdbUser;

  @Column({ type: "varchar", length: 64 })
  code!: string;

  @Column({ type: "boolean", default: false })
  consumed!: boolean;

  @CreateDateColumn()
  created_at!: Date;
}
