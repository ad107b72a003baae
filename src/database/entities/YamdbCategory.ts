import { Entity } from "typeorm";

import { YamdbCatalogEntry } from "./YamdbCatalogEntry";

@Entity("yamdb_categories")
export class YamdbCategory extends YamdbCatalogEntry {}
