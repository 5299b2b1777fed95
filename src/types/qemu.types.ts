// =============================================================================
// Argument model
// =============================================================================

/**
 * A QEMU command-line switch such as `-m` or `-device`.
 * Two keys are the same flag only when the strings are identical.
 */
export type FlagKey = string

/**
 * One user-supplied argument row: the key followed by zero or more value
 * fragments. Fragments are joined with no separator to form the value.
 *
 * @example
 * ```typescript
 * const row: FlagRow = ['-netdev', 'user,id=mynet0,', 'hostfwd=tcp::{{HTTPPort}}-:22']
 * ```
 */
export type FlagRow = string[]

/** Ordered override rows from user configuration */
export type OverrideSpec = FlagRow[]

/** Computed baseline arguments, exactly one value per key */
export type DefaultSpec = Map<FlagKey, string>

/**
 * Per-key ordered value buckets. An empty bucket means the flag is emitted
 * on its own, without a value.
 */
export type MultiValueMap = Map<FlagKey, string[]>

/** Flat argument list handed to the process supervisor */
export type TokenSequence = string[]

// =============================================================================
// QEMU option types
// =============================================================================

/** Hardware accelerator appended to `-machine` as `accel=` */
export type Accelerator = 'kvm' | 'tcg' | 'xen' | 'hax' | 'hvf' | 'whpx' | 'none'

/** Disk bus type for the `-drive if=` option */
export type DiskInterface = 'ide' | 'scsi' | 'virtio' | 'virtio-scsi'

/** Cache mode for the `-drive cache=` option */
export type DiskCache = 'writethrough' | 'writeback' | 'none' | 'unsafe' | 'directsync'

/** Discard mode for the `-drive discard=` option */
export type DiskDiscard = 'unmap' | 'ignore'

/** Output disk image format */
export type DiskFormat = 'qcow2' | 'raw'

/**
 * Boot order string passed verbatim to `-boot`.
 * Typical values are `once=d` (CD-ROM first, then disk) and `c` (disk).
 */
export type BootDrive = string

// =============================================================================
// Constants
// =============================================================================

/** Memory size given to every VM unless overridden */
export const DEFAULT_MEMORY = '512M'

/** Display backend used when the VM is not headless */
export const DEFAULT_DISPLAY = 'sdl'

/** Host address as seen from inside QEMU's user-mode network */
export const USER_NET_HOST_IP = '10.0.2.2'

/** Netdev id shared by `-netdev` and `-device` */
export const USER_NETDEV_ID = 'user.0'

/** Guest SSH port targeted by the host forward */
export const GUEST_SSH_PORT = 22

/** Default QEMU binary */
export const DEFAULT_QEMU_BINARY = 'qemu-system-x86_64'
