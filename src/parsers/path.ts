import {
  ParsedPath,
  PathCommandParameterCount,
  PathCommandType,
  PathState,
  SvgPathCommandMap
} from '../types/paths'
import { ParseError } from './exceptions'

const UNSUPPORTED_COMMANDS = [
  PathCommandType.EllipticalArcAbsolute,
  PathCommandType.EllipticalArcRelative
]

function createInitialState(): PathState {
  return {
    command: PathCommandType.NotSet,
    values: [],
    valueBuffer: '',
    currentPoint: { x: 0, y: 0 },
    isPathOpen: false,
    subPathStart: null,
    firstMoveCompleted: false
  }
}

function isMoveCommand(command: PathCommandType): boolean {
  return command === PathCommandType.MoveAbsolute || command === PathCommandType.MoveRelative
}

function isStopCommand(command: PathCommandType): boolean {
  return command === PathCommandType.StopAbsolute || command === PathCommandType.StopRelative
}

export class SvgPathParser {
  private state: PathState = createInitialState()
  private path: ParsedPath = { commands: [], startPosition: { x: 0, y: 0 } }

  private isWhitespace(char: string): boolean {
    return [',', ' ', '\t', '\n', '\r'].includes(char)
  }

  private isNumericChar(char: string): boolean {
    return /[\d.eE]/.test(char)
  }

  private isExponentPending(): boolean {
    const lastChar = this.state.valueBuffer[this.state.valueBuffer.length - 1]
    return lastChar === 'e' || lastChar === 'E'
  }

  private handleCommandChar(char: string): void {
    const command = SvgPathCommandMap[char]

    if (UNSUPPORTED_COMMANDS.includes(command)) {
      throw new ParseError(`Unsupported path command: ${command}`)
    }

    // 1. Push any pending value from previous command.
    this.pushValue()

    // 2. Process previous command, or reject values that came before any command.
    this.handleCommand()
    if (this.state.command === PathCommandType.NotSet && !isMoveCommand(command)) {
      throw new ParseError(`Path data must begin with a move command, found: ${char}`)
    }

    // 3. Set new command and clear its values.
    this.state.command = command
    this.state.values = []

    // 4. Commands without values (z/Z) are processed immediately.
    if (isStopCommand(command)) {
      this.processValues([])
    }
  }

  private handleSign(sign: string): void {
    // A sign directly after an exponent marker belongs to the current number.
    if (this.isExponentPending()) {
      this.state.valueBuffer += sign
      return
    }
    this.pushValue()
    this.state.valueBuffer = sign
  }

  private handleDecimalPoint(): void {
    // "1.5.5" is two numbers: 1.5 and .5
    if (this.state.valueBuffer.includes('.') && !/[eE]/.test(this.state.valueBuffer)) {
      this.pushValue()
    }
    this.state.valueBuffer += '.'
  }

  private handleChar(char: string): void {
    if (char in SvgPathCommandMap) {
      this.handleCommandChar(char)
    } else if (char === '-' || char === '+') {
      this.handleSign(char)
    } else if (char === '.') {
      this.handleDecimalPoint()
    } else if (this.isWhitespace(char)) {
      this.pushValue()
    } else if (this.isNumericChar(char)) {
      this.state.valueBuffer += char
    } else {
      throw new ParseError(`Unexpected character in path data: ${char}`)
    }
  }

  private pushValue(): void {
    if (this.state.valueBuffer.length === 0) {
      return
    }

    const value = Number(this.state.valueBuffer)
    if (isNaN(value)) {
      throw new ParseError(`Invalid number in path data: ${this.state.valueBuffer}`)
    }
    this.state.values.push(value)
    this.state.valueBuffer = ''
  }

  private processValues(parameters: number[]): void {
    // Pull current (soon to be previous) command point.
    const previousPoint = { ...this.state.currentPoint }

    // Handle any move command (start of path or subpath).
    if (isMoveCommand(this.state.command)) {
      const isFirstMove = !this.state.firstMoveCompleted
      if (isFirstMove || this.state.command === PathCommandType.MoveAbsolute) {
        // First move in the entire path is always treated as absolute.
        this.state.currentPoint = { x: parameters[0], y: parameters[1] }
      } else {
        this.state.currentPoint.x += parameters[0]
        this.state.currentPoint.y += parameters[1]
      }

      if (isFirstMove) {
        this.path.startPosition = { ...this.state.currentPoint }
        this.state.firstMoveCompleted = true
      }

      // Every move command starts a new subpath.
      this.state.subPathStart = { ...this.state.currentPoint }
      this.state.isPathOpen = true

      this.path.commands.push({
        type: isFirstMove ? PathCommandType.MoveAbsolute : this.state.command,
        parameters,
        startPositionAbsolute: previousPoint,
        endPositionAbsolute: { ...this.state.currentPoint }
      })
      return
    }

    // Handle path closing.
    if (isStopCommand(this.state.command)) {
      if (this.state.subPathStart && this.state.isPathOpen) {
        this.state.currentPoint = { ...this.state.subPathStart }
        this.state.isPathOpen = false
      }

      this.path.commands.push({
        type: this.state.command,
        parameters: [],
        startPositionAbsolute: previousPoint,
        endPositionAbsolute: { ...this.state.currentPoint }
      })
      return
    }

    // Drawing after a close reopens the subpath at the same start point.
    this.state.isPathOpen = true

    // Update currentPoint for absolute commands.
    switch (this.state.command) {
      case PathCommandType.LineAbsolute:
        this.state.currentPoint = { x: parameters[0], y: parameters[1] }
        break
      case PathCommandType.HorizontalLineAbsolute:
        this.state.currentPoint.x = parameters[0]
        break
      case PathCommandType.VerticalLineAbsolute:
        this.state.currentPoint.y = parameters[0]
        break
      case PathCommandType.CubicBezierAbsolute:
        this.state.currentPoint = { x: parameters[4], y: parameters[5] }
        break
      case PathCommandType.QuadraticBezierAbsolute:
        this.state.currentPoint = { x: parameters[2], y: parameters[3] }
        break
      case PathCommandType.CubicBezierSmoothAbsolute:
        this.state.currentPoint = { x: parameters[2], y: parameters[3] }
        break
      case PathCommandType.QuadraticBezierSmoothAbsolute:
        this.state.currentPoint = { x: parameters[0], y: parameters[1] }
        break
    }

    // Update currentPoint for relative commands.
    switch (this.state.command) {
      case PathCommandType.LineRelative:
        this.state.currentPoint.x += parameters[0]
        this.state.currentPoint.y += parameters[1]
        break
      case PathCommandType.HorizontalLineRelative:
        this.state.currentPoint.x += parameters[0]
        break
      case PathCommandType.VerticalLineRelative:
        this.state.currentPoint.y += parameters[0]
        break
      case PathCommandType.CubicBezierRelative:
        this.state.currentPoint.x += parameters[4]
        this.state.currentPoint.y += parameters[5]
        break
      case PathCommandType.QuadraticBezierRelative:
        this.state.currentPoint.x += parameters[2]
        this.state.currentPoint.y += parameters[3]
        break
      case PathCommandType.CubicBezierSmoothRelative:
        this.state.currentPoint.x += parameters[2]
        this.state.currentPoint.y += parameters[3]
        break
      case PathCommandType.QuadraticBezierSmoothRelative:
        this.state.currentPoint.x += parameters[0]
        this.state.currentPoint.y += parameters[1]
        break
    }

    this.path.commands.push({
      type: this.state.command,
      parameters,
      startPositionAbsolute: previousPoint,
      endPositionAbsolute: { ...this.state.currentPoint }
    })
  }

  private handleCommand(): void {
    const command = this.state.command
    const nParams = PathCommandParameterCount[command]

    if (command === PathCommandType.NotSet || nParams === 0) {
      if (this.state.values.length > 0) {
        throw new ParseError(
          `Values with no command to consume them: ${this.state.values.join(', ')}`
        )
      }
      return
    }

    if (this.state.values.length === 0 || this.state.values.length % nParams !== 0) {
      throw new ParseError(
        `Expected a multiple of ${nParams} values for ${command}, got ${this.state.values.length}`
      )
    }

    // Process values in groups based on the expected parameter count.
    for (let i = 0; i < this.state.values.length; i += nParams) {
      this.processValues(this.state.values.slice(i, i + nParams))

      // Pairs following a moveto are implicit lineto commands.
      if (this.state.command === PathCommandType.MoveAbsolute) {
        this.state.command = PathCommandType.LineAbsolute
      } else if (this.state.command === PathCommandType.MoveRelative) {
        this.state.command = PathCommandType.LineRelative
      }
    }
  }

  public parsePath(pathData: string): ParsedPath {
    // Reset.
    this.state = createInitialState()
    this.path = {
      commands: [],
      startPosition: { x: 0, y: 0 }
    }

    // Read.
    for (const char of pathData) {
      this.handleChar(char)
    }

    this.pushValue()
    this.handleCommand()

    return this.path
  }
}
