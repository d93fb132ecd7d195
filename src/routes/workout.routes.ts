import { Router } from "express";
import { Auth } from "../app/Middlewares";
import { WorkoutController } from "../app/Controllers";

const workout: Router = Router();

workout.get("/", Auth, WorkoutController.home);
workout.post("/log", Auth, WorkoutController.logSet);
workout.post("/session/done", Auth, WorkoutController.finishSession);

export default workout;
