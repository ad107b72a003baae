import { IYamdbCategory } from "../api/structures/IYamdbCategory";
import { IYamdbGenre } from "../api/structures/IYamdbGenre";

/** Categories and genres share the same representation. */
export namespace YamdbCatalogTransformer {
  export const transform = (entry: {
    name: string;
    slug: string;
  }): IYamdbCategory & IYamdbGenre => ({
    name: entry.name,
    slug: entry.slug,
  });
}
