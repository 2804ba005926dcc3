export const defaultRemote = 'origin'

export const defaultProtectedBranches = ['main', 'master', 'develop', 'release']

/** Per git invocation */
export const defaultTimeoutMs = 30_000

/** Per git invocation that talks to the remote */
export const defaultRemoteTimeoutMs = 60_000

/** Whole batch of deletions */
export const defaultDeadlineMs = 30_000

export const defaultChunkSize = 10

export const defaultConcurrency = 4

/** Subjects in list output are cut to this many characters */
export const defaultSubjectWidth = 30
