export { accountService, AccountService } from './account.service';
export type { Account } from './account.service';
export { accountController, AccountController } from './account.controller';
export { default as accountRoutes } from './account.routes';
