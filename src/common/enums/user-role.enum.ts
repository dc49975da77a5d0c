export enum UserRoleType {
  ADMIN = 'admin',
  FACULTY = 'faculty',
  STUDENT = 'student',
}
