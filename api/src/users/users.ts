export interface User {
  id: number;
  username: string;
  createdAt: Date;
}

export interface StoredUser extends User {
  passwordHash: string;
}

export interface UserRow {
  id: number;
  username: string;
  password_hash: string;
  created_at: Date;
}

export interface PublicUser {
  id: number;
  username: string;
  created_at: string;
}
