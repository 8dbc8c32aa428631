export { initPool, closePool, getPool, withTransaction } from './client';
export { PgUserRepository } from './repositories/user-repository';
export { PgProjectMemberRepository } from './repositories/project-member-repository';
