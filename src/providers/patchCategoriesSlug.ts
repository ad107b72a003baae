import { CatalogUtil } from "../utils/CatalogUtil";

/**
 * PATCH on a single category, refused with 405 even for administrators.
 */
export async function patchCategoriesSlug(): Promise<never> {
  return CatalogUtil.refuse("PATCH");
}
