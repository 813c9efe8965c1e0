import { Module } from '@nestjs/common';
import { AccessPolicyService } from './access-policy.service';

@Module({
    exports: [AccessPolicyService],
    providers: [AccessPolicyService],
})
export class AccessPolicyModule {}
