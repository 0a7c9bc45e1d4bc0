import React from 'react'
import { Box, Text } from 'ink'
import { palette } from '../theme.js'

interface PanelProps {
  title: string
  /** Right-aligned summary next to the title, e.g. a count. */
  summary: string
  focused: boolean
  grow?: number
  /** Shown in place of the rows when set. */
  placeholder?: string | undefined
  children?: React.ReactNode
}

/** One bordered dashboard section: title row, then rows or a placeholder. */
export function Panel({ title, summary, focused, grow = 1, placeholder, children }: PanelProps): React.ReactElement {
  return (
    <Box
      flexGrow={grow}
      flexDirection="column"
      borderStyle="single"
      borderColor={focused ? palette.blue : palette.border}
      paddingX={1}
    >
      <Box justifyContent="space-between">
        <Text color={palette.blue} bold={focused} dimColor={!focused}>{title.toUpperCase()}</Text>
        <Text color={palette.muted}>{summary}</Text>
      </Box>
      {placeholder !== undefined ? <Text color={palette.dim}>{placeholder}</Text> : children}
    </Box>
  )
}
