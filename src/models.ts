export type Platform = 'tiktok';


export interface UserRecord {
id: string;
username: string;
passwordHash: string;
createdAt: number; // epoch ms
}


export interface TokenRecord {
userId: string;
accessToken: string;
refreshToken?: string;
expiresAt?: number; // epoch ms
refreshExpiresAt?: number; // epoch ms
openId?: string;
scope?: string;
updatedAt: number;
}


export type PostStatus = 'posted' | 'failed';


export interface PostRecord {
id: string;
filename: string;
platform: Platform;
status: PostStatus;
errorCode?: string;
error?: string;
publishId?: string;
userId?: string;
createdAt: number;
}


export interface OAuthStateRecord {
state: string;
userId: string;
createdAt: number;
}


export interface DBSchema {
users: UserRecord[];
tokens: TokenRecord[];
posts: PostRecord[];
oauthStates: OAuthStateRecord[];
}
