import { Command } from 'commander'
import chalk from 'chalk'
import { initConfig } from '../config/init.js'
import { errorMessage } from '../utils/errors.js'

interface InitCommandOptions {
  rootPackages?: string
  inputs?: string
  force?: boolean
}

export const initCommand = new Command('init')
  .description('Write a starter depsum.yaml')
  .argument('[dir]', 'Directory to write the config into', '.')
  .option('-p, --root-packages <packages>', 'Comma separated root Python packages')
  .option('-i, --inputs <glob>', 'Glob selecting the input files')
  .option('-f, --force', 'Overwrite an existing config')
  .action((dir: string, options: InitCommandOptions) => {
    try {
      const path = initConfig(dir, {
        rootPackages: options.rootPackages?.split(',').map(p => p.trim()).filter(Boolean),
        inputs: options.inputs,
        force: options.force
      })
      console.log(chalk.green(`\n✓ Config created at: ${path}`))
      console.log(chalk.dim('Edit path_rules to describe how files in this repo depend on each other.'))
    } catch (error) {
      console.error(chalk.red(`Error: ${errorMessage(error)}`))
      process.exit(1)
    }
  })
