import { Entity } from "typeorm";

import { YamdbCatalogEntry } from "./YamdbCatalogEntry";

@Entity("yamdb_genres")
export class YamdbGenre extends YamdbCatalogEntry {}
