import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  JoinTable,
  ManyToMany,
  ManyToOne,
  PrimaryGeneratedColumn,
} from "typeorm";

import { YamdbCategory } from "./YamdbCategory";
import { YamdbGenre } from "./YamdbGenre";

@Entity("yamdb_titles")
export class YamdbTitle {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index()
  @Column({ type: "varchar", length: 256 })
  name!: string;

  @Index()
  @Column({ type: "int" })
  year!: number;

  @Column({ type: "text", nullable: true })
  description!: string | null;

  @Column({ type: "int", nullable: true })
  category_id!: number | null;

  // deleting a category keeps its titles
  @ManyToOne(() => YamdbCategory, { nullable: true, onDelete: "SET NULL" })
  @JoinColumn({ name: "category_id" })
  category!: YamdbCategory | null;

  @ManyToMany(() => YamdbGenre)
  @JoinTable({
    name: "yamdb_title_genres",
    joinColumn: { name: "title_id", referencedColumnName: "id" },
    inverseJoinColumn: { name: "genre_id", referencedColumnName: "id" },
  })
  genres!: YamdbGenre[];

  @CreateDateColumn()
  created_at!: Date;
}
