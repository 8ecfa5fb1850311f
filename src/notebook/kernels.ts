import type { KernelSpec } from './types.js'

/**
 * Reference kernelspecs for commonly installed Jupyter kernels.
 * Availability depends on the machine that runs the notebook.
 */
export const COMMON_KERNELS: readonly KernelSpec[] = [
  { name: 'python3', display_name: 'Python 3', language: 'python' },
  { name: 'ir', display_name: 'R', language: 'R' },
  { name: 'julia-1.10', display_name: 'Julia 1.10', language: 'julia' },
  { name: 'javascript', display_name: 'JavaScript (Node.js)', language: 'javascript' },
  { name: 'tslab', display_name: 'TypeScript', language: 'typescript' },
  { name: 'bash', display_name: 'Bash', language: 'bash' },
  { name: 'scala', display_name: 'Scala', language: 'scala' },
  { name: 'java', display_name: 'Java', language: 'java' },
  { name: 'xcpp17', display_name: 'C++17', language: 'C++17' },
  { name: 'go', display_name: 'Go', language: 'go' },
  { name: 'rust', display_name: 'Rust', language: 'rust' },
]
