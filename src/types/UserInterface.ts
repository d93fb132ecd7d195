export interface UserInterface {
  id: number;
  email: string;
  isAdmin: boolean;
  createdAt: string;
}

/** Row shape including the credential column; never leaves the auth layer. */
export interface UserWithPassword extends UserInterface {
  passwordHash: string;
}
