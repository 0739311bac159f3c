import { clsx, type ClassValue } from 'clsx'
import { twMerge } from 'tailwind-merge'

/**
 * cn() - 조건부 클래스 병합 유틸리티
 *
 * clsx로 조건부 클래스를 처리하고,
 * tailwind-merge로 충돌하는 유틸리티를 병합합니다.
 *
 * @example
 * ```tsx
 * cn('px-2 py-1', isSelected && 'font-bold', className)
 * cn('text-sm', 'text-xs') // 'text-xs'
 * ```
 */
export function cn(...inputs: ClassValue[]) {
  return twMerge(clsx(inputs))
}
