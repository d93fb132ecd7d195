import { NextFunction, Request, Response } from "express";

import { requireUser } from "../../../Middlewares/auth";
import { templateIdBody } from "../../../Validation/requestSchemas";
import { calendarDay } from "../../../../lib/db";
import { closeActiveSession } from "../../../../services/sessions/lifecycle";
import { homeFor } from "../redirects";

export const postFinishSession = (req: Request, res: Response, next: NextFunction) => {
  try {
    const user = requireUser(req);
    const parsed = templateIdBody.safeParse(req.body);
    if (!parsed.success) {
      return res.redirect(303, "/");
    }
    closeActiveSession(user.id, parsed.data.template_id, calendarDay());
    return res.redirect(303, homeFor(parsed.data.template_id));
  } catch (err) {
    return next(err);
  }
};
