/**
 * Dependency validation utility for the external player
 */

import which from 'which';
import { Result } from '@dirplay/shared';
import { PlayerError } from '../../domain/playback/errors';

/**
 * Player found on PATH
 */
export interface ResolvedPlayer {
  command: string;
  path: string;
}

/**
 * Dependency validation result
 */
export interface DependencyValidationResult {
  isValid: boolean;
  available: ResolvedPlayer[];
  missingDependencies: string[];
  errors: string[];
}

/**
 * Dependency validator for player executables
 */
export class DependencyValidator {
  /**
   * Resolve the first available player among the candidates
   */
  static async validateDependencies(candidates: readonly string[]): Promise<Result<ResolvedPlayer, PlayerError>> {
    const result = await this.checkAllDependencies(candidates);

    if (!result.isValid) {
      console.error(`No media player found. Tried: ${result.missingDependencies.join(', ')}`);
      result.errors.forEach(error => console.error(`  ${error}`));
      return { success: false, error: 'PLAYER_LAUNCH_FAILED' };
    }

    const chosen = result.available[0];
    if (chosen.command !== candidates[0]) {
      console.warn(`${candidates[0]} not found, using ${chosen.command}`);
    }

    return { success: true, value: chosen };
  }

  /**
   * Check all candidates and return detailed results, in candidate order
   */
  static async checkAllDependencies(candidates: readonly string[]): Promise<DependencyValidationResult> {
    const results = await Promise.all(candidates.map(command => this.checkDependency(command)));

    const available: ResolvedPlayer[] = [];
    const missingDependencies: string[] = [];
    const errors: string[] = [];

    results.forEach((result, index) => {
      const command = candidates[index];
      if (result.success) {
        available.push({ command, path: result.value });
      } else {
        missingDependencies.push(command);
        errors.push(result.error);
      }
    });

    return {
      isValid: available.length > 0,
      available,
      missingDependencies,
      errors
    };
  }

  /**
   * Check if a specific executable is available on PATH
   */
  static async checkDependency(command: string): Promise<Result<string, string>> {
    try {
      const resolved = await which(command);
      return {
        success: true,
        value: resolved
      };
    } catch (error) {
      return {
        success: false,
        error: `Command '${command}' not found in PATH`
      };
    }
  }

  /**
   * Get installation suggestions for missing players
   */
  static getInstallationSuggestions(missingDependencies: readonly string[]): Record<string, string[]> {
    const suggestions: Record<string, string[]> = {};

    missingDependencies.forEach(dep => {
      switch (dep) {
        case 'mpv':
          suggestions[dep] = [
            'apt-get install mpv  # Ubuntu/Debian',
            'dnf install mpv      # Fedora',
            'brew install mpv     # macOS',
            'pacman -S mpv        # Arch Linux'
          ];
          break;
        case 'mplayer':
          suggestions[dep] = [
            'apt-get install mplayer  # Ubuntu/Debian',
            'brew install mplayer     # macOS'
          ];
          break;
        case 'vlc':
          suggestions[dep] = [
            'apt-get install vlc  # Ubuntu/Debian',
            'brew install --cask vlc  # macOS'
          ];
          break;
        default:
          suggestions[dep] = [`Please install ${dep} manually`];
      }
    });

    return suggestions;
  }

  /**
   * Validate the player at startup, printing suggestions when none is installed
   */
  static async validateAtStartup(candidates: readonly string[]): Promise<Result<ResolvedPlayer, PlayerError>> {
    const result = await this.validateDependencies(candidates);

    if (!result.success) {
      const suggestions = this.getInstallationSuggestions(candidates);

      console.error('\nInstallation suggestions:');
      Object.entries(suggestions).forEach(([dep, commands]) => {
        console.error(`\n${dep}:`);
        commands.forEach(cmd => console.error(`  ${cmd}`));
      });
      console.error('\nInstall a player or set DIRPLAY_PLAYER, then try again.');
    }

    return result;
  }
}
