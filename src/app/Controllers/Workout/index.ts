import { NextFunction, Request, Response } from "express";
import { getHome } from "./Actions/getHomeAction";
import { postLogSet } from "./Actions/logSetAction";
import { postFinishSession } from "./Actions/finishSessionAction";

export class WorkoutController {
  static home = (req: Request, res: Response, next: NextFunction) => {
    return getHome(req, res, next);
  };

  static logSet = (req: Request, res: Response, next: NextFunction) => {
    return postLogSet(req, res, next);
  };

  static finishSession = (req: Request, res: Response, next: NextFunction) => {
    return postFinishSession(req, res, next);
  };
}
