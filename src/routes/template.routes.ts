import { Router } from "express";
import { OnlyAdmins } from "../app/Middlewares";
import { TemplateController } from "../app/Controllers";

const template: Router = Router();

template.post("/add_exercise", OnlyAdmins, TemplateController.addExercise);
template.post("/remove_exercise", OnlyAdmins, TemplateController.removeExercise);

export default template;
