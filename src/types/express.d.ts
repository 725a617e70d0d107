declare namespace Express {
  export interface Request {
    user?: import("../auth/identityCache").AuthenticatedUser;
    /** Raw bearer token that resolved to `user`. */
    accessToken?: string;
  }
}
