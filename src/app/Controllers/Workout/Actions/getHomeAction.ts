import { NextFunction, Request, Response } from "express";

import { requireUser } from "../../../Middlewares/auth";
import { homeQuery } from "../../../Validation/requestSchemas";
import { calendarDay } from "../../../../lib/db";
import { fetchSetsForSession, getActiveSession } from "../../../../services/sessions/lifecycle";
import { fetchLastForExercises, fetchPrForExercises } from "../../../../services/stats/aggregator";
import {
  getExercisesForTemplate,
  getTemplateById,
  getTemplates,
} from "../../../../services/templates/catalog";
import { renderHome } from "../../../../views/home";

export const getHome = (req: Request, res: Response, next: NextFunction) => {
  try {
    const user = requireUser(req);
    const query = homeQuery.parse(req.query);

    const templates = getTemplates();
    const selectedId = query.t ?? templates[0]?.id;
    const selectedTemplate = selectedId ? getTemplateById(selectedId) : null;
    const exercises = selectedTemplate ? getExercisesForTemplate(selectedTemplate.id) : [];

    const names = exercises.map((ex) => ex.name);
    const today = calendarDay();
    const activeSessionId = selectedTemplate ? getActiveSession(user.id, selectedTemplate.id, today) : null;

    res.type("html").send(
      renderHome({
        user,
        templates,
        selectedTemplate,
        exercises,
        last: fetchLastForExercises(user.id, names),
        pr: fetchPrForExercises(user.id, names),
        today,
        // Edit mode is an admin view only.
        edit: query.edit === "1" && user.isAdmin,
        activeSessionId,
        sessionSets: fetchSetsForSession(activeSessionId, 200),
      }),
    );
  } catch (err) {
    next(err);
  }
};
