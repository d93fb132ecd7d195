import { Router } from "express";
import { OnlyAdmins } from "../app/Middlewares";
import { getDbInfoAction } from "../app/Controllers";

const admin: Router = Router();

admin.get("/db_info", OnlyAdmins, getDbInfoAction);

export default admin;
