export const POSTS_INDEX = 'posts';
export const USERS_INDEX = 'users';
