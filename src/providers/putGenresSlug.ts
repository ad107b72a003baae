import { CatalogUtil } from "../utils/CatalogUtil";

/**
 * PUT on a single genre, refused with 405 even for administrators.
 */
export async function putGenresSlug(): Promise<never> {
  return CatalogUtil.refuse("PUT");
}
