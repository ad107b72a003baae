import { CatalogUtil } from "../utils/CatalogUtil";

/**
 * GET on a single category, refused with 405 even for administrators.
 */
export async function getCategoriesSlug(): Promise<never> {
  return CatalogUtil.refuse("GET");
}
