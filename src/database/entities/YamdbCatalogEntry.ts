import { Column, PrimaryGeneratedColumn } from "typeorm";

/**
 * Columns shared by categories and genres, each stored in its own table.
 */
export abstract class YamdbCatalogEntry {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: "varchar", length: 256 })
  name!: string;

  @Column({ type: "varchar", length: 50, unique: true })
  slug!: string;
}
