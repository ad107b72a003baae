import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  Unique,
} from "typeorm";

import { YamdbTitle } from "./YamdbTitle";
import { YamdbUser } from "./YamdbUser";

@Entity("yamdb_reviews")
@Unique("uq_yamdb_reviews_title_author", ["title_id", "author_id"])
export class YamdbReview {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index()
  @Column({ type: "int" })
  title_id!: number;

  @ManyToOne(() => YamdbTitle, { onDelete: "CASCADE" })
  @JoinColumn({ name: "title_id" })
  title!: YamdbTitle;

  @Column({ type: "int" })
  author_id!: number;

  @ManyToOne(() => YamdbUser, { onDelete: "CASCADE" })
  @JoinColumn({ name: "author_id" })
  author!: YamdbUser;

  /** Integer from 1 to 10. */
  @Column({ type: "int" })
  score!: number;

  @Column({ type: "text" })
  text!: string;

  @CreateDateColumn()
  created_at!: Date;
}
