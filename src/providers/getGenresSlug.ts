import { CatalogUtil } from "../utils/CatalogUtil";

/**
 * GET on a single genre, refused with 405 even for administrators.
 */
export async function getGenresSlug(): Promise<never> {
  return CatalogUtil.refuse("GET");
}
