import { getGenresSlug } from "../../../../src/providers/getGenresSlug";
import { patchGenresSlug } from "../../../../src/providers/patchGenresSlug";
import { putGenresSlug } from "../../../../src/providers/putGenresSlug";
import { validateHttpStatus } from "../../../helpers/validateHttpStatus";

/** A single genre is neither read nor updated: 405 whoever asks. */
export async function test_api_genre_at() {
  await validateHttpStatus("GET", 405, () => getGenresSlug());
  await validateHttpStatus("PUT", 405, () => putGenresSlug());
  await validateHttpStatus("PATCH", 405, () => patchGenresSlug());
}
