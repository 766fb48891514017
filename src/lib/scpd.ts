import { TR64Error, TR64ErrorCode } from './errors'
import type { XmlElement } from './xml'

export interface ParameterSpec {
  /** name of the related state variable */
  variable: string
  dataType: string
  defaultValue?: string
}

export interface ActionSpec {
  inParameters: Record<string, ParameterSpec>
  outParameters: Record<string, ParameterSpec>
}

export interface ServiceSCPD {
  actions: Map<string, ActionSpec>
  /** state variables the service sends events for */
  eventedVariables: string[]
}

interface VariableSpec {
  dataType: string
  defaultValue?: string
  sendEvents: boolean
}

interface ArgumentSpec {
  name: string
  direction: 'in' | 'out'
  variable: string
}

const invalid = (message: string) =>
  new TR64Error(TR64ErrorCode.InvalidDefinition, message)

function parseArgument(element: XmlElement): ArgumentSpec {
  let name: string | undefined
  let direction: string | undefined
  let variable: string | undefined
  for (const child of element.children) {
    switch (child.name.toLowerCase()) {
      case 'name':
        name = child.text
        break
      case 'direction':
        direction = child.text
        break
      case 'relatedstatevariable':
        variable = child.text
        break
    }
  }
  if (!name) {
    throw invalid('Parameter definition does not contain a name.')
  }
  if (direction !== 'in' && direction !== 'out') {
    throw invalid(`Parameter definition does not contain a direction: ${name}`)
  }
  if (!variable) {
    throw invalid(`Parameter definition does not reference a variable: ${name}`)
  }
  return { name, direction, variable }
}

function parseActions(actionList: XmlElement) {
  const actions = new Map<string, ArgumentSpec[]>()
  for (const action of actionList.children) {
    let name: string | undefined
    const args: ArgumentSpec[] = []
    for (const child of action.children) {
      const tag = child.name.toLowerCase()
      if (tag === 'name') {
        name = child.text
      } else if (tag === 'argumentlist') {
        args.push(...child.children.map(parseArgument))
      }
    }
    if (!name) {
      throw invalid('Action has not a name assigned.')
    }
    if (actions.has(name)) {
      throw invalid(`Action name defined more than once: ${name}`)
    }
    actions.set(name, args)
  }
  return actions
}

function parseVariables(stateTable: XmlElement) {
  const variables = new Map<string, VariableSpec>()
  for (const variable of stateTable.children) {
    let name: string | undefined
    let dataType: string | undefined
    let defaultValue: string | undefined
    for (const child of variable.children) {
      switch (child.name.toLowerCase()) {
        case 'name':
          name = child.text
          break
        case 'datatype':
          dataType = child.text
          break
        case 'defaultvalue':
          defaultValue = child.text
          break
      }
    }
    if (!name) {
      throw invalid('Variable has no name defined.')
    }
    if (!dataType) {
      throw invalid(`No dataType was defined by variable: ${name}`)
    }
    if (variables.has(name)) {
      throw invalid(`Variable has been defined multiple times: ${name}`)
    }
    variables.set(name, {
      dataType,
      defaultValue,
      sendEvents: variable.attributes.sendEvents === 'yes',
    })
  }
  return variables
}

/**
 * parses a service control protocol description. Every argument of an action
 * gets the data type (and default value) of the state variable it relates to.
 */
export function parseSCPD(root: XmlElement): ServiceSCPD {
  let actionArguments = new Map<string, ArgumentSpec[]>()
  let variables = new Map<string, VariableSpec>()

  for (const element of root.children) {
    const tag = element.name.toLowerCase()
    if (tag === 'actionlist') {
      actionArguments = parseActions(element)
    } else if (tag === 'servicestatetable') {
      variables = parseVariables(element)
    }
  }

  const actions = new Map<string, ActionSpec>()
  actionArguments.forEach((args, name) => {
    const spec: ActionSpec = { inParameters: {}, outParameters: {} }
    args.forEach(argument => {
      const variable = variables.get(argument.variable)
      if (!variable) {
        throw invalid(
          `Variable reference in action can not be resolved: ${argument.variable}`
        )
      }
      const parameters =
        argument.direction === 'in' ? spec.inParameters : spec.outParameters
      const parameter: ParameterSpec = {
        variable: argument.variable,
        dataType: variable.dataType,
      }
      if (variable.defaultValue !== undefined) {
        parameter.defaultValue = variable.defaultValue
      }
      parameters[argument.name] = parameter
    })
    actions.set(name, spec)
  })

  const eventedVariables: string[] = []
  variables.forEach((variable, name) => {
    if (variable.sendEvents) {
      eventedVariables.push(name)
    }
  })
  return { actions, eventedVariables }
}
