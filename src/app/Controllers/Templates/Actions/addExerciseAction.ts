import { NextFunction, Request, Response } from "express";

import { addExerciseBody } from "../../../Validation/requestSchemas";
import { addExerciseToTemplate } from "../../../../services/templates/catalog";
import { homeFor } from "../../Workout/redirects";

export const addExercise = (req: Request, res: Response, next: NextFunction) => {
  try {
    const parsed = addExerciseBody.safeParse(req.body);
    if (!parsed.success) {
      return res.redirect(303, homeFor(req.body?.template_id, true));
    }
    addExerciseToTemplate(parsed.data.template_id, parsed.data.exercise_name);
    return res.redirect(303, homeFor(parsed.data.template_id, true));
  } catch (err) {
    return next(err);
  }
};
