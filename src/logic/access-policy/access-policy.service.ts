import { Injectable } from '@nestjs/common';
import { ALL_DEPARTMENTS, DepartmentTag, Role } from '../../utils/types';
import { InvariantViolationError } from '../../utils/errors';

// every role sees "general"; adding a Role fails to compile until it is mapped here
export const ACCESS_TABLE = {
    [Role.FINANCE]: [DepartmentTag.GENERAL, DepartmentTag.FINANCE],
    [Role.MARKETING]: [DepartmentTag.GENERAL, DepartmentTag.MARKETING],
    [Role.HR]: [DepartmentTag.GENERAL, DepartmentTag.HR],
    [Role.ENGINEERING]: [DepartmentTag.GENERAL, DepartmentTag.ENGINEERING],
    [Role.C_LEVEL]: ALL_DEPARTMENTS,
    [Role.EMPLOYEE]: [DepartmentTag.GENERAL],
} satisfies Record<Role, readonly DepartmentTag[]>;

const RESOLVED: ReadonlyMap<string, ReadonlySet<DepartmentTag>> = new Map(
    Object.entries(ACCESS_TABLE).map(([role, departments]) => [role, new Set(departments)]),
);

@Injectable()
export class AccessPolicyService {

    allowedDepartments(role: Role): ReadonlySet<DepartmentTag> {
        const allowed = RESOLVED.get(role);
        if (!allowed) {
            throw new InvariantViolationError(`unknown role "${String(role)}"`);
        }
        return allowed;
    }

    accessibleDepartments(role: Role): DepartmentTag[] {
        const allowed = this.allowedDepartments(role);
        return ALL_DEPARTMENTS.filter(department => allowed.has(department));
    }

    canAccess(role: Role, department: DepartmentTag): boolean {
        return this.allowedDepartments(role).has(department);
    }
}
