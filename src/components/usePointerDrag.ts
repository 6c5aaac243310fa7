import { useCallback, useEffect, useRef } from 'react'

// Tracks a drag on window so the gesture keeps going when the pointer leaves the widget.
// `onMove` always sees the latest props; the drag state is whatever `begin` was given.
export function usePointerDrag<T>(onMove: (event: PointerEvent, drag: T) => void) {
  const dragRef = useRef<T | null>(null)
  const onMoveRef = useRef(onMove)

  useEffect(() => {
    onMoveRef.current = onMove
  }, [onMove])

  const handlePointerMove = useCallback((event: PointerEvent) => {
    const drag = dragRef.current
    if (drag === null) return
    onMoveRef.current(event, drag)
  }, [])

  const handlePointerUp: () => void = useCallback(() => {
    dragRef.current = null
    window.removeEventListener('pointermove', handlePointerMove)
    window.removeEventListener('pointerup', handlePointerUp)
  }, [handlePointerMove])

  useEffect(() => {
    return () => {
      window.removeEventListener('pointermove', handlePointerMove)
      window.removeEventListener('pointerup', handlePointerUp)
    }
  }, [handlePointerMove, handlePointerUp])

  return useCallback(
    (drag: T) => {
      dragRef.current = drag
      window.addEventListener('pointermove', handlePointerMove)
      window.addEventListener('pointerup', handlePointerUp)
    },
    [handlePointerMove, handlePointerUp],
  )
}
