import { positiveId } from "../../Validation/requestSchemas";

/** Home URL for the template named in a form, or plain "/" when it is unusable. */
export function homeFor(templateId: unknown, edit = false): string {
  const parsed = positiveId.safeParse(templateId);
  if (!parsed.success) return "/";
  return edit ? `/?t=${parsed.data}&edit=1` : `/?t=${parsed.data}`;
}
