import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from "typeorm";

import { YamdbReview } from "./YamdbReview";
import { YamdbUser } from "./YamdbUser";

@Entity("yamdb_comments")
export class YamdbComment {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index()
  @Column({ type: "int" })
  review_id!: number;

  @ManyToOne(() => YamdbReview, { onDelete: "CASCADE" })
  @JoinColumn({ name: "review_id" })
  review!: YamdbReview;

  @Column({ type: "int" })
  author_id!: number;

  @ManyToOne(() => YamdbUser, { onDelete: "CASCADE" })
  @JoinColumn({ name: "author_id" })
  author!: YamdbUser;

  @Column({ type: "text" })
  text!: string;

  @CreateDateColumn()
  created_at!: Date;
}
