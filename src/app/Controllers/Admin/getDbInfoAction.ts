import { NextFunction, Request, Response } from "express";

import { getDbInfo } from "../../../services/diagnostics/dbInfo";

export const getDbInfoAction = (_req: Request, res: Response, next: NextFunction) => {
  try {
    return res.json(getDbInfo());
  } catch (err) {
    return next(err);
  }
};
