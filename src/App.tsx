import { useRef, useEffect, useState, useCallback, type PointerEvent as ReactPointerEvent } from 'react'
import './App.css'
import { Simulation } from './sim/Simulation'
import { renderSystem } from './sim/systems/render'
import { nextMaterial, previousMaterial } from './sim/selector'
import { materialDef, materialName } from './sim/materials'
import {
  SAND, WORLD_COLS, WORLD_ROWS, CELL_SIZE, PHYSICS_STEP, FPS_REPORT_INTERVAL,
  type MaterialId,
} from './sim/constants'
import { clientToCell, type CellPos } from './input'
import { readConfig } from './config'

type PointerMode = 'paint' | 'erase'

/** ABGR uint32 → CSS color */
function toCss(abgr: number): string {
  const r = abgr & 0xFF, g = (abgr >>> 8) & 0xFF, b = (abgr >>> 16) & 0xFF
  return `rgb(${r}, ${g}, ${b})`
}

function App() {
  const canvasRef = useRef<HTMLCanvasElement>(null)
  const [config] = useState(() => readConfig(window.location.search, Date.now()))
  const [sim] = useState(() => new Simulation(WORLD_COLS, WORLD_ROWS, config.seed))
  const [material, setMaterial] = useState<MaterialId>(config.material ?? SAND)
  const [isPaused, setIsPaused] = useState(false)
  const [fps, setFps] = useState(0)

  // Refs mirror state for the animation loop and pointer handlers
  const materialRef = useRef<MaterialId>(material)
  const pausedRef = useRef(false)
  const pointerModeRef = useRef<PointerMode | null>(null)
  const lastCellRef = useRef<CellPos | null>(null)

  useEffect(() => { materialRef.current = material }, [material])
  useEffect(() => { pausedRef.current = isPaused }, [isPaused])

  // Frame loop: step at a fixed rate, render, report FPS
  useEffect(() => {
    const canvas = canvasRef.current
    if (!canvas) return
    const ctx = canvas.getContext('2d')
    if (!ctx) {
      console.error('Simulation canvas: 2D context unavailable')
      return
    }
    const image = ctx.createImageData(sim.cols, sim.rows)
    const data32 = new Uint32Array(image.data.buffer)

    let frameId = 0
    let lastUpdateTime = 0
    let physicsAccum = 0
    let fpsFrameCount = 0
    let fpsLastReport = 0
    let pauseAtStep = config.pauseAtStep

    const gameLoop = (timestamp: number) => {
      if (lastUpdateTime === 0) {
        lastUpdateTime = timestamp
        fpsLastReport = timestamp
      }
      const delta = Math.min(timestamp - lastUpdateTime, 100)
      lastUpdateTime = timestamp

      if (!pausedRef.current) {
        physicsAccum += delta
        if (physicsAccum >= PHYSICS_STEP) {
          sim.step()
          if (pauseAtStep !== null && sim.simStep >= pauseAtStep) {
            pausedRef.current = true
            pauseAtStep = null
            setIsPaused(true)
          }
          physicsAccum = Math.min(physicsAccum - PHYSICS_STEP, PHYSICS_STEP)
        }
      }

      renderSystem(sim.grid, data32)
      ctx.putImageData(image, 0, 0)

      fpsFrameCount++
      if (timestamp - fpsLastReport >= FPS_REPORT_INTERVAL) {
        setFps(Math.round(fpsFrameCount / ((timestamp - fpsLastReport) / 1000)))
        fpsFrameCount = 0
        fpsLastReport = timestamp
      }

      frameId = requestAnimationFrame(gameLoop)
    }

    frameId = requestAnimationFrame(gameLoop)
    return () => cancelAnimationFrame(frameId)
  }, [sim, config])

  // Arrow keys cycle the material, space pauses, C clears
  useEffect(() => {
    const handleKeyDown = (e: KeyboardEvent) => {
      if (e.key === 'ArrowRight') setMaterial(m => nextMaterial(m))
      else if (e.key === 'ArrowLeft') setMaterial(m => previousMaterial(m))
      else if (e.key === ' ') setIsPaused(p => !p)
      else if (e.key === 'c' || e.key === 'C') sim.clear()
    }
    window.addEventListener('keydown', handleKeyDown)
    return () => window.removeEventListener('keydown', handleKeyDown)
  }, [sim])

  // Each pointer event paints the segment from the last cell to the current one
  const paintSegment = useCallback((e: ReactPointerEvent<HTMLCanvasElement>) => {
    const mode = pointerModeRef.current
    if (!mode) return
    const pos = clientToCell(e.clientX, e.clientY, e.currentTarget.getBoundingClientRect(), sim.cols, sim.rows)
    if (!pos) return
    const from = lastCellRef.current ?? pos
    sim.paint(from.x, from.y, pos.x, pos.y, mode === 'erase' ? 'erase' : materialRef.current)
    lastCellRef.current = pos
  }, [sim])

  const handlePointerDown = useCallback((e: ReactPointerEvent<HTMLCanvasElement>) => {
    e.preventDefault()
    // Right button erases
    pointerModeRef.current = e.button === 2 ? 'erase' : 'paint'
    lastCellRef.current = null
    paintSegment(e)
  }, [paintSegment])

  const handlePointerUp = useCallback(() => {
    pointerModeRef.current = null
    lastCellRef.current = null
  }, [])

  const handlePointerMove = useCallback((e: ReactPointerEvent<HTMLCanvasElement>) => {
    // No button held: it was released off the canvas, so the stroke is over
    if (e.buttons === 0) {
      handlePointerUp()
      return
    }
    paintSegment(e)
  }, [paintSegment, handlePointerUp])

  return (
    <div className="app">
      <div className="canvas-container">
        <canvas
          ref={canvasRef}
          width={sim.cols}
          height={sim.rows}
          role="application"
          aria-label="Particle simulation canvas"
          onPointerDown={handlePointerDown}
          onPointerMove={handlePointerMove}
          onPointerUp={handlePointerUp}
          onPointerCancel={handlePointerUp}
          onContextMenu={(e) => e.preventDefault()}
          style={{ width: sim.cols * CELL_SIZE, height: sim.rows * CELL_SIZE, touchAction: 'none' }}
        />
        <div className="fps-counter">{fps} fps</div>
      </div>
      <div className="controls">
        <button className="ctrl-btn prev" onClick={() => setMaterial(m => previousMaterial(m))} aria-label="Previous material">
          <svg viewBox="0 0 24 24" fill="currentColor"><path d="M15.41 7.41L14 6l-6 6 6 6 1.41-1.41L10.83 12z" /></svg>
        </button>
        <div className="material-label">
          <span className="material-dot" style={{ background: toCss(materialDef(material).color) }} />
          <span>{materialName(material)}</span>
        </div>
        <button className="ctrl-btn next" onClick={() => setMaterial(m => nextMaterial(m))} aria-label="Next material">
          <svg viewBox="0 0 24 24" fill="currentColor"><path d="M10 6L8.59 7.41 13.17 12l-4.58 4.59L10 18l6-6z" /></svg>
        </button>
        <button className={`ctrl-btn playpause ${isPaused ? 'paused' : 'playing'}`} onClick={() => setIsPaused(p => !p)} aria-label={isPaused ? 'Play simulation' : 'Pause simulation'}>
          {isPaused
            ? <svg viewBox="0 0 24 24" fill="currentColor"><path d="M8 5v14l11-7z" /></svg>
            : <svg viewBox="0 0 24 24" fill="currentColor"><path d="M6 4h4v16H6zm8 0h4v16h-4z" /></svg>
          }
        </button>
        <button className="ctrl-btn reset" onClick={() => sim.clear()} aria-label="Clear simulation">
          <svg viewBox="0 0 24 24" fill="currentColor"><path d="M19 6.41L17.59 5 12 10.59 6.41 5 5 6.41 10.59 12 5 17.59 6.41 19 12 13.41 17.59 19 19 17.59 13.41 12z" /></svg>
        </button>
      </div>
    </div>
  )
}

export default App
