import type { CSSProperties } from 'react';
import type { SkeletonTopology, SkeletonVariant } from '@keymark/core';
import { cn } from '../../utils';

/**
 * SkeletonLegend Props
 */
export interface SkeletonLegendProps {
  /** 변형 정의 (session.getVariantDefinitions()) */
  variants: readonly SkeletonTopology[];
  /** 변형 선택 (스켈레톤 추가) 핸들러, 없으면 목록만 표시 */
  onSelect?: (variant: SkeletonVariant) => void;
  /** 커스텀 스타일 */
  style?: CSSProperties;
  /** 커스텀 클래스명 */
  className?: string;
}

/**
 * SkeletonLegend
 *
 * 변형별 클래스 인덱스와 파트 목록 (라벨 파일 키포인트 순서)
 *
 * @example
 * ```tsx
 * <SkeletonLegend
 *   variants={session.getVariantDefinitions()}
 *   onSelect={(variant) => session.addSkeleton(variant)}
 * />
 * ```
 */
export function SkeletonLegend({ variants, onSelect, style, className }: SkeletonLegendProps) {
  return (
    <div className={cn('flex flex-col gap-2 p-2 text-sm', className)} style={style}>
      {variants.map((topology, index) => (
        <section key={topology.variant} aria-label={topology.label}>
          <div className="flex items-center gap-2 font-bold">
            {onSelect ? (
              <button
                type="button"
                className="px-2 py-0.5 rounded border"
                onClick={() => onSelect(topology.variant)}
              >
                {index + 1}: {topology.label}
              </button>
            ) : (
              <span>{topology.label}</span>
            )}
            <span className="text-xs opacity-70">class {topology.classIndex}</span>
          </div>
          <ol className="list-decimal pl-6 text-xs">
            {topology.parts.map((part) => (
              <li key={part}>{part}</li>
            ))}
          </ol>
        </section>
      ))}
    </div>
  );
}
