import AuthRoutes from "./auth.routes";
import WorkoutRoutes from "./workout.routes";
import TemplateRoutes from "./template.routes";
import AdminRoutes from "./admin.routes";
import HealthRoutes from "./health";

export {
  AuthRoutes,
  WorkoutRoutes,
  TemplateRoutes,
  AdminRoutes,
  HealthRoutes,
};
