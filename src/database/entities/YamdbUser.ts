import {
  Column,
  CreateDateColumn,
  Entity,
  PrimaryGeneratedColumn,
} from "typeorm";

import { IEYamdbRole } from "../../api/structures/IEYamdbRole";

@Entity("yamdb_users")
export class YamdbUser {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: "varchar", length: 150, unique: true })
  username!: string;

  @Column({ type: "varchar", length: 254, unique: true })
  email!: string;

  @Column({ type: "varchar", length: 16, default: "user" })
  role!: IEYamdbRole;

  /** Set once a confirmation code has been exchanged for a token. */
  @Column({ type: "boolean", default: false })
  is_confirmed!: boolean;

  @Column({ type: "varchar", length: 150, default: "" })
  first_name!: string;

  @Column({ type: "varchar", length: 150, default: "" })
  last_name!: string;

  @Column({ type: "text", default: "" })
  bio!: string;

  @CreateDateColumn()
  created_at!: Date;
}
