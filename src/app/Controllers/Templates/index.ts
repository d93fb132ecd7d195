import { NextFunction, Request, Response } from "express";
import { addExercise } from "./Actions/addExerciseAction";
import { removeExercise } from "./Actions/removeExerciseAction";

export class TemplateController {
  static addExercise = (req: Request, res: Response, next: NextFunction) => {
    return addExercise(req, res, next);
  };

  static removeExercise = (req: Request, res: Response, next: NextFunction) => {
    return removeExercise(req, res, next);
  };
}
