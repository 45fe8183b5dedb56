import { InputError } from "../../errors";
import type { AppContext } from "../../types";

export function requireId(c: AppContext): string {
  const id = c.req.param("id");
  if (!id) {
    throw new InputError("Classification id is required");
  }
  return id;
}
