import { Router } from "express";
import { AuthController } from "../app/Controllers";

const auth: Router = Router();

auth.get("/login", AuthController.showLogin);
auth.post("/login", AuthController.login);
auth.get("/register", AuthController.showRegister);
auth.post("/register", AuthController.register);
auth.post("/logout", AuthController.logout);

export default auth;
