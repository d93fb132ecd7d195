import { Transform } from "class-transformer";
import { IsNotEmpty, IsString } from "class-validator";

import { normalizeEmail } from "../Models/User";

export class UserLoginInput {
  @Transform(({ value }) => (typeof value === "string" ? normalizeEmail(value) : value))
  @IsString()
  @IsNotEmpty({ message: "email is required." })
  email!: string;

  @IsString()
  @IsNotEmpty({ message: "password is required." })
  password!: string;
}
