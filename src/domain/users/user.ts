/**
 * User entity as stored. `passwordHash` never leaves the server:
 * responses go through {@link toUserResponse}.
 */
export interface User {
  readonly id: string;
  readonly name: string;
  readonly email: string;
  readonly age: number | null;
  readonly passwordHash: string;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly isDeleted: boolean;
  readonly deletedAt: Date | null;
}

export interface UserResponse {
  id: string;
  name: string;
  email: string;
  age: number | null;
  isDeleted: boolean;
  createdAt: string;
  updatedAt: string;
  deletedAt: string | null;
}

export function toUserResponse(user: User): UserResponse {
  return {
    id: user.id,
    name: user.name,
    email: user.email,
    age: user.age,
    isDeleted: user.isDeleted,
    createdAt: user.createdAt.toISOString(),
    updatedAt: user.updatedAt.toISOString(),
    deletedAt: user.deletedAt ? user.deletedAt.toISOString() : null,
  };
}
