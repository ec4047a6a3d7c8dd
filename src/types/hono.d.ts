import type { UserInfoClaims } from '../flows/userinfo.ts'

declare module 'hono' {
  interface ContextVariableMap {
    userInfo: UserInfoClaims
  }
}
