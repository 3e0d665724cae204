import { err, ok, type Result } from "./result.js";
import type { AccountId, AssetDetails } from "./types.js";

export function ensureOwner(
  details: AssetDetails | undefined,
  caller: AccountId,
): Result<AssetDetails, "Unknown" | "NoPermission"> {
  if (!details) return err("Unknown");
  if (details.owner !== caller) return err("NoPermission");
  return ok(details);
}
