import { CatalogUtil } from "../utils/CatalogUtil";

/**
 * PUT on a single category, refused with 405 even for administrators.
 */
export async function putCategoriesSlug(): Promise<never> {
  return CatalogUtil.refuse("PUT");
}
