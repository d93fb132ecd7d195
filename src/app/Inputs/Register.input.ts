import { Transform } from "class-transformer";
import { IsByteLength, IsEmail, IsString, MaxLength, MinLength } from "class-validator";

import { normalizeEmail } from "../Models/User";

export const MIN_PASSWORD_LENGTH = 8;
// bcrypt only reads the first 72 bytes.
export const MAX_PASSWORD_BYTES = 72;

export class RegisterInput {
    @Transform(({ value }) => (typeof value === "string" ? normalizeEmail(value) : value))
    @IsEmail({}, { message: "Email should be valid." })
    @MaxLength(254)
    email!: string;

    @IsString({ message: "password is required." })
    @MinLength(MIN_PASSWORD_LENGTH, { message: `password must be at least ${MIN_PASSWORD_LENGTH} characters.` })
    @IsByteLength(0, MAX_PASSWORD_BYTES, { message: `password must be at most ${MAX_PASSWORD_BYTES} bytes.` })
    password!: string;
}
