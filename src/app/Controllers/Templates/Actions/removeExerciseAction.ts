import { NextFunction, Request, Response } from "express";

import { removeExerciseBody } from "../../../Validation/requestSchemas";
import { removeExerciseFromTemplate } from "../../../../services/templates/catalog";
import { homeFor } from "../../Workout/redirects";

export const removeExercise = (req: Request, res: Response, next: NextFunction) => {
  try {
    const parsed = removeExerciseBody.safeParse(req.body);
    if (!parsed.success) {
      return res.redirect(303, homeFor(req.body?.template_id, true));
    }
    removeExerciseFromTemplate(parsed.data.template_id, parsed.data.exercise_id);
    return res.redirect(303, homeFor(parsed.data.template_id, true));
  } catch (err) {
    return next(err);
  }
};
