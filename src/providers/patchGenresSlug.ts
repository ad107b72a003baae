import { CatalogUtil } from "../utils/CatalogUtil";

/**
 * PATCH on a single genre, refused with 405 even for administrators.
 */
export async function patchGenresSlug(): Promise<never> {
  return CatalogUtil.refuse("PATCH");
}
