export interface User {
  /** Subject identifier returned as `sub` */
  id: string
  username: string
  email: string
}

export interface UserWithPassword extends User {
  passwordDigest: string
  passwordSalt: string
}

/**
 * Entry in the users seed file. Passwords are hashed when the store is built.
 */
export interface UserSeed {
  id: string
  username: string
  email: string
  password: string
}
