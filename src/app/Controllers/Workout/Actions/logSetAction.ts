import { NextFunction, Request, Response } from "express";

import { requireUser } from "../../../Middlewares/auth";
import { logSetBody } from "../../../Validation/requestSchemas";
import { logger } from "../../../../observability/logging";
import { logSet, LogSetResult } from "../../../../services/sets/logSet";
import { HttpError } from "../../../../utils/httpError";
import { homeFor } from "../redirects";

export const postLogSet = (req: Request, res: Response, next: NextFunction) => {
  try {
    const user = requireUser(req);
    const parsed = logSetBody.safeParse(req.body);
    if (!parsed.success) {
      return res.redirect(303, homeFor(req.body?.template_id));
    }
    const { template_id, exercise, weight, reps } = parsed.data;

    let result: LogSetResult;
    try {
      result = logSet(user.id, { templateId: template_id, exercise, weight, reps });
    } catch (err) {
      return next(new HttpError(500, "Failed to save set; check server logs", { cause: err }));
    }
    if (result.status === "discarded") {
      logger.debug({ userId: user.id, reason: result.reason }, "set discarded");
    }
    return res.redirect(303, homeFor(template_id));
  } catch (err) {
    return next(err);
  }
};
