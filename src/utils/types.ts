export enum Role {
    FINANCE = 'finance',
    MARKETING = 'marketing',
    HR = 'hr',
    ENGINEERING = 'engineering',
    C_LEVEL = 'c-level',
    EMPLOYEE = 'employee',
}

export enum DepartmentTag {
    GENERAL = 'general',
    FINANCE = 'finance',
    MARKETING = 'marketing',
    HR = 'hr',
    ENGINEERING = 'engineering',
}

// canonical order used whenever departments are listed
export const ALL_DEPARTMENTS: readonly DepartmentTag[] = [
    DepartmentTag.GENERAL,
    DepartmentTag.FINANCE,
    DepartmentTag.MARKETING,
    DepartmentTag.HR,
    DepartmentTag.ENGINEERING,
];

const ROLE_VALUES = new Set<string>(Object.values(Role));
const DEPARTMENT_VALUES = new Set<string>(Object.values(DepartmentTag));

export function isRole(value: unknown): value is Role {
    return typeof value === 'string' && ROLE_VALUES.has(value);
}

export function isDepartmentTag(value: unknown): value is DepartmentTag {
    return typeof value === 'string' && DEPARTMENT_VALUES.has(value);
}

/** Identity handed over by the identity provider; trusted as-is past the guard. */
export interface AuthUser {
    userId: string;
    username: string;
    role: Role;
}

/** Fragment as returned by retrieval. The embedding stays inside the index. */
export interface FragmentRecord {
    id: string;
    content: string;
    department: DepartmentTag;
    sourceFile: string;
    updatedAt: Date;
}

export interface Fragment extends FragmentRecord {
    embedding: number[];
}

export interface ScoredFragment {
    fragment: FragmentRecord;
    /** cosine similarity, -1..1 */
    score: number;
}

export type RetrievalResult = ScoredFragment[];

export interface SourceCitation {
    file: string;
    department: DepartmentTag;
    updatedAt: string;
    relevanceScore: number;
}

export interface Turn {
    id: string;
    query: string;
    answer: string;
    sources: SourceCitation[];
    createdAt: Date;
}

export interface Session {
    userId: string;
    turns: Turn[];
    createdAt: Date;
    lastActiveAt: Date;
}

export type QueryState =
    | 'Received'
    | 'AuthorizedDepartmentsResolved'
    | 'Retrieved'
    | 'ContextMerged'
    | 'Generated'
    | 'Composed'
    | 'Delivered'
    | 'Refused'
    | 'Failed';

export type QueryStatus = 'answered' | 'refused' | 'failed';

export interface ChatRequest {
    userId: string;
    role: Role;
    query: string;
    /** how many prior turns to include, clamped to the memory window */
    priorTurnsHint?: number;
}

export interface ChatResponse {
    status: QueryStatus;
    answer: string;
    sources: SourceCitation[];
    userRole: Role;
    timestamp: string;
    queryProcessed: string;
}

export interface ComposedResponse {
    answer: string;
    sources: SourceCitation[];
}
