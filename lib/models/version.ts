import { SemVer } from 'semver';

/**
 * What a run should do, derived from the installed and published versions
 */
export type UpdatePlan =
    | { action: 'none'; current: SemVer; latest: SemVer }
    | { action: 'install-fresh'; latest: SemVer }
    | { action: 'upgrade'; current: SemVer; latest: SemVer };
