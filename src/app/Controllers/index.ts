import { AuthController } from "./auth.controller";
import { WorkoutController } from "./Workout";
import { TemplateController } from "./Templates";
import { getDbInfoAction } from "./Admin/getDbInfoAction";

export {
    AuthController,
    WorkoutController,
    TemplateController,
    getDbInfoAction,
};
