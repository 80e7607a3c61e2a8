import { Module } from '@nestjs/common';
import { CompanyDirectoryService } from './company-directory.service';
import { buildSignupWorkflow } from './signup.workflow';

export const SIGNUP_WORKFLOW = Symbol('SIGNUP_WORKFLOW');

@Module({
  providers: [
    CompanyDirectoryService,
    {
      provide: SIGNUP_WORKFLOW,
      inject: [CompanyDirectoryService],
      useFactory: (directory: CompanyDirectoryService) => buildSignupWorkflow(directory),
    },
  ],
  exports: [SIGNUP_WORKFLOW],
})
export class SignupModule {}
